/**
 * Outbound command encoders. Every encoder returns a complete packet payload
 * (opcode + body), ready for {@link encodeFrame}.
 * @module meshcore/commands
 */
import {createHash} from 'crypto';

import {
    BinaryReqType,
    CHANNEL_NAME_SIZE,
    CHANNEL_SECRET_SIZE,
    CommandOpcode,
    CONTACT_NAME_SIZE,
    CONTACT_PATH_SIZE,
    ContactType,
    ControlDataType,
    COORDINATE_SCALE,
    FLOOD_SCOPE_KEY_SIZE,
    MESHCORE_APP_PROTOCOL_VERSION,
    MESHCORE_DEFAULT_CLIENT_NAME,
    MessageType,
    StatsType,
} from './constants';
import {invalidArgument} from './errors';
import {type PublicKey, type TelemetryMode, telemetryModeToByte} from './types';

const u8 = (name: string, value: number): number => {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
        throw invalidArgument(`${name} must be an integer 0-255, got ${value}`, {[name]: value});
    }
    return value;
};

const u16le = (name: string, value: number): Buffer => {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
        throw invalidArgument(`${name} must be an integer 0-65535, got ${value}`, {[name]: value});
    }
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value, 0);
    return buf;
};

const u32le = (name: string, value: number): Buffer => {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
        throw invalidArgument(`${name} must be an unsigned 32-bit integer, got ${value}`, {[name]: value});
    }
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value, 0);
    return buf;
};

const i32le = (name: string, value: number): Buffer => {
    if (!Number.isInteger(value) || value < -0x80000000 || value > 0x7fffffff) {
        throw invalidArgument(`${name} must be a signed 32-bit integer, got ${value}`, {[name]: value});
    }
    const buf = Buffer.alloc(4);
    buf.writeInt32LE(value, 0);
    return buf;
};

const fixed = (data: Buffer | Uint8Array, size: number): Buffer => {
    const out = Buffer.alloc(size);
    out.set(data.subarray(0, size), 0);
    return out;
};

const exactly = (name: string, data: Buffer | Uint8Array, size: number): Buffer => {
    if (data.length !== size) {
        throw invalidArgument(`${name} must be ${size} bytes, got ${data.length}`);
    }
    return Buffer.from(data);
};

const command = (opcode: CommandOpcode, ...parts: Array<Buffer | number[]>): Buffer =>
    Buffer.concat([Buffer.from([opcode]), ...parts.map((part) => (Buffer.isBuffer(part) ? part : Buffer.from(part)))]);

const utf8 = (text: string): Buffer => Buffer.from(text, 'utf8');

/** Current time as unsigned epoch seconds. */
export const nowSeconds = (): number => Math.floor(Date.now() / 1000) >>> 0;

/** Encode a coordinate in degrees as the device's ×1e6 fixed point. */
export const encodeCoordinate = (degrees: number): number => Math.round(degrees * COORDINATE_SCALE);

export const validateCoordinates = (latitude: number, longitude: number): void => {
    if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
        throw invalidArgument(`Latitude must be between -90 and 90, got ${latitude}`, {latitude});
    }
    if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
        throw invalidArgument(`Longitude must be between -180 and 180, got ${longitude}`, {longitude});
    }
};

// Device

export const encodeAppStart = (clientName = MESHCORE_DEFAULT_CLIENT_NAME): Buffer =>
    command(CommandOpcode.AppStart, [MESHCORE_APP_PROTOCOL_VERSION], utf8('      '), utf8(clientName));

export const encodeGetTime = (): Buffer => command(CommandOpcode.GetTime);

export const encodeSetTime = (timestamp: number): Buffer =>
    command(CommandOpcode.SetTime, u32le('timestamp', timestamp));

export const encodeGetBattery = (): Buffer => command(CommandOpcode.GetBattery);

export const encodeDeviceQuery = (): Buffer => command(CommandOpcode.DeviceQuery, [MESHCORE_APP_PROTOCOL_VERSION]);

export const encodeSendAdvert = (flood = false): Buffer =>
    (flood ? command(CommandOpcode.SendAdvert, [0x01]) : command(CommandOpcode.SendAdvert));

export const encodeSetName = (name: string): Buffer => command(CommandOpcode.SetName, utf8(name));

export const encodeSetCoords = (latitude: number, longitude: number): Buffer => {
    validateCoordinates(latitude, longitude);
    return command(
        CommandOpcode.SetCoords,
        i32le('latitude', encodeCoordinate(latitude)),
        i32le('longitude', encodeCoordinate(longitude)),
        i32le('altitude', 0),
    );
};

export const encodeSetTxPower = (dbm: number): Buffer => command(CommandOpcode.SetTxPower, i32le('txPower', dbm));

export type RadioParams = {
    frequencyMhz: number;
    bandwidthKhz: number;
    spreadingFactor: number;
    codingRate: number;
};

export const encodeSetRadio = (params: RadioParams): Buffer => command(
    CommandOpcode.SetRadio,
    u32le('frequency', Math.max(0, Math.round(params.frequencyMhz * 1000))),
    u32le('bandwidth', Math.max(0, Math.round(params.bandwidthKhz * 1000))),
    [u8('spreadingFactor', params.spreadingFactor), u8('codingRate', params.codingRate)],
);

export const encodeSetTuning = (rxDelay: number, airtimeFactor: number): Buffer => command(
    CommandOpcode.SetTuning,
    i32le('rxDelay', rxDelay),
    i32le('airtimeFactor', airtimeFactor),
    [0x00, 0x00],
);

export const encodeSetDevicePin = (pin: number): Buffer => command(CommandOpcode.SetDevicePin, u32le('pin', pin));

export type OtherParams = {
    manualAddContacts: boolean;
    telemetryMode: TelemetryMode;
    advertLocationPolicy: number;
    multiAcks: number;
};

export const encodeSetOtherParams = (params: OtherParams): Buffer => command(CommandOpcode.SetOtherParams, [
    params.manualAddContacts ? 0x01 : 0x00,
    telemetryModeToByte(params.telemetryMode),
    u8('advertLocationPolicy', params.advertLocationPolicy),
    u8('multiAcks', params.multiAcks),
]);

export const encodeReboot = (): Buffer => command(CommandOpcode.Reboot, utf8('reboot'));

export const encodeExportPrivateKey = (): Buffer => command(CommandOpcode.ExportPrivateKey);

export const encodeImportPrivateKey = (key: Buffer | Uint8Array): Buffer =>
    command(CommandOpcode.ImportPrivateKey, exactly('privateKey', key, 32));

export const encodeGetStats = (type: StatsType): Buffer => command(CommandOpcode.GetStats, [type]);

export const encodeGetCustomVars = (): Buffer => command(CommandOpcode.GetCustomVars);

export const encodeSetCustomVar = (key: string, value: string): Buffer => {
    if (key.length === 0 || key.includes(':') || key.includes(',')) {
        throw invalidArgument(`Custom variable key must be non-empty without ':' or ',', got "${key}"`, {key});
    }
    return command(CommandOpcode.SetCustomVar, utf8(`${key}:${value}`));
};

// Contacts

export const encodeGetContacts = (since?: number): Buffer =>
    (since === undefined ? command(CommandOpcode.GetContacts) : command(CommandOpcode.GetContacts, u32le('since', since)));

export type ContactUpdate = {
    publicKey: PublicKey;
    type: ContactType | number;
    flags: number;
    /** Negative for flood routing. */
    pathLength: number;
    path: Buffer | Uint8Array;
    name: string;
    lastAdvert: number;
    latitude?: number | null;
    longitude?: number | null;
};

export const encodeUpdateContact = (update: ContactUpdate): Buffer => {
    if (!Number.isInteger(update.pathLength) || update.pathLength < -128 || update.pathLength > 127) {
        throw invalidArgument(`pathLength must be a signed byte, got ${update.pathLength}`);
    }
    const latitude = update.latitude ?? 0;
    const longitude = update.longitude ?? 0;
    validateCoordinates(latitude, longitude);
    const pathLength = Buffer.alloc(1);
    pathLength.writeInt8(update.pathLength, 0);
    return command(
        CommandOpcode.UpdateContact,
        update.publicKey.toBuffer(),
        [u8('type', update.type), u8('flags', update.flags)],
        pathLength,
        fixed(update.path, CONTACT_PATH_SIZE),
        fixed(utf8(update.name), CONTACT_NAME_SIZE),
        u32le('lastAdvert', update.lastAdvert),
        i32le('latitude', encodeCoordinate(latitude)),
        i32le('longitude', encodeCoordinate(longitude)),
    );
};

export const encodeRemoveContact = (key: PublicKey): Buffer => command(CommandOpcode.RemoveContact, key.toBuffer());

export const encodeResetPath = (key: PublicKey): Buffer => command(CommandOpcode.ResetPath, key.toBuffer());

export const encodeShareContact = (key: PublicKey): Buffer => command(CommandOpcode.ShareContact, key.toBuffer());

export const encodeExportContact = (key?: PublicKey): Buffer =>
    (key ? command(CommandOpcode.ExportContact, key.toBuffer()) : command(CommandOpcode.ExportContact));

export const encodeImportContact = (card: Buffer | Uint8Array): Buffer => {
    if (card.length === 0) throw invalidArgument('Contact card must not be empty');
    return command(CommandOpcode.ImportContact, Buffer.from(card));
};

// Messaging

export const encodeSendMessage = (destination: PublicKey, text: string, attempt: number, timestamp: number): Buffer =>
    command(
        CommandOpcode.SendMessage,
        [MessageType.Private, u8('attempt', attempt)],
        u32le('timestamp', timestamp),
        destination.prefix(),
        utf8(text),
    );

export const encodeSendCommand = (destination: PublicKey, text: string, timestamp: number): Buffer =>
    command(
        CommandOpcode.SendMessage,
        [MessageType.Command, 0x00],
        u32le('timestamp', timestamp),
        destination.prefix(),
        utf8(text),
    );

export const encodeSendChannelMessage = (channelIndex: number, text: string, timestamp: number): Buffer =>
    command(
        CommandOpcode.SendChannelMsg,
        [0x00, u8('channelIndex', channelIndex)],
        u32le('timestamp', timestamp),
        utf8(text),
    );

export const encodeGetMessage = (): Buffer => command(CommandOpcode.GetMessage);

export const encodeSendLogin = (destination: PublicKey, password: string): Buffer =>
    command(CommandOpcode.SendLogin, destination.toBuffer(), utf8(password));

export const encodeSendLogout = (destination: PublicKey): Buffer =>
    command(CommandOpcode.SendLogout, destination.toBuffer());

export const encodeSendStatusRequest = (destination: PublicKey): Buffer =>
    command(CommandOpcode.SendStatusReq, destination.toBuffer());

// Channels

export const encodeGetChannel = (index: number): Buffer => command(CommandOpcode.GetChannel, [u8('index', index)]);

export const encodeSetChannel = (index: number, name: string, secret: Buffer | Uint8Array): Buffer => command(
    CommandOpcode.SetChannel,
    [u8('index', index)],
    fixed(utf8(name), CHANNEL_NAME_SIZE),
    exactly('secret', secret, CHANNEL_SECRET_SIZE),
);

// Binary requests, telemetry and paths

export const encodeBinaryRequest = (
    destination: PublicKey,
    requestType: BinaryReqType,
    data: Buffer | Uint8Array = Buffer.alloc(0),
): Buffer => command(CommandOpcode.BinaryReq, destination.toBuffer(), [requestType], Buffer.from(data));

export type NeighboursQuery = {
    maxResults: number;
    offset?: number;
    orderBy?: number;
    /** Key prefix length in the reply: 4, 6, 8 or 32. */
    prefixLength?: number;
};

export const encodeNeighboursRequest = (destination: PublicKey, query: NeighboursQuery, tag: number): Buffer => {
    const body = Buffer.concat([
        Buffer.from([0x00, u8('maxResults', query.maxResults)]),
        u16le('offset', query.offset ?? 0),
        Buffer.from([u8('orderBy', query.orderBy ?? 0), u8('prefixLength', query.prefixLength ?? 6)]),
        u32le('tag', tag),
    ]);
    return encodeBinaryRequest(destination, BinaryReqType.Neighbours, body);
};

export const encodeGetSelfTelemetry = (): Buffer => command(CommandOpcode.Telemetry, [0x00, 0x00, 0x00]);

export const encodeTelemetryRequest = (destination: PublicKey): Buffer =>
    command(CommandOpcode.Telemetry, [0x00, 0x00, 0x00], destination.toBuffer());

export const encodePathDiscovery = (destination: PublicKey): Buffer =>
    command(CommandOpcode.PathDiscovery, [0x00], destination.toBuffer());

export type TraceParams = {
    tag: number;
    authCode: number;
    flags?: number;
    path?: Buffer | Uint8Array;
};

export const encodeSendTrace = (params: TraceParams): Buffer => command(
    CommandOpcode.SendTrace,
    u32le('tag', params.tag),
    u32le('authCode', params.authCode),
    [u8('flags', params.flags ?? 0)],
    params.path ? Buffer.from(params.path) : Buffer.alloc(0),
);

export const encodeSetFloodScope = (scopeKey: Buffer | Uint8Array): Buffer =>
    command(CommandOpcode.SetFloodScope, [0x00], exactly('scopeKey', scopeKey, FLOOD_SCOPE_KEY_SIZE));

/** Flood-scope key for a topic: first 16 bytes of its SHA-256. */
export const floodScopeKeyForTopic = (topic: string): Buffer =>
    createHash('sha256').update(topic, 'utf8').digest().subarray(0, FLOOD_SCOPE_KEY_SIZE);

export type NodeDiscoverParams = {
    filter: number;
    prefixOnly?: boolean;
    tag: number;
    since?: number;
};

export const encodeNodeDiscover = (params: NodeDiscoverParams): Buffer => command(
    CommandOpcode.SendControlData,
    [ControlDataType.NodeDiscoverReq | ((params.prefixOnly ?? true) ? 0x01 : 0x00), u8('filter', params.filter)],
    u32le('tag', params.tag),
    params.since === undefined ? Buffer.alloc(0) : u32le('since', params.since),
);

// Signing

export const encodeSignStart = (): Buffer => command(CommandOpcode.SignStart);

export const encodeSignData = (chunk: Buffer | Uint8Array): Buffer => command(CommandOpcode.SignData, Buffer.from(chunk));

export const encodeSignFinish = (): Buffer => command(CommandOpcode.SignFinish);
