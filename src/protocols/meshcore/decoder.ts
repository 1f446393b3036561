/**
 * Packet classifier and kind -> decoder table.
 * @module meshcore/decoder
 */
import {PacketType, PRIVATE_KEY_SIZE, PUBLIC_KEY_PREFIX_SIZE, PUBLIC_KEY_SIZE, StatsType} from './constants';
import {MeshCoreError, wrapMeshCoreError} from './errors';
import type {MeshCoreEvent, MeshCoreEventType} from './events';
import {Telemetry} from './lpp';
import {
    parseBattery,
    parseChannel,
    parseChannelMessage,
    parseContact,
    parseContactMessage,
    parseCoreStats,
    parseCustomVars,
    parseDeviceInfo,
    parseDeviceStatus,
    parsePacketStats,
    parseRadioStats,
    parseSelfInfo,
} from './parsers';
import {PublicKey, type StatsData} from './types';

type PacketDecoder = (body: Buffer, packetType: PacketType) => MeshCoreEvent;

const KNOWN_PACKET_TYPES = new Set<number>(
    Object.values(PacketType).filter((value): value is PacketType => typeof value === 'number'),
);

export const isPacketType = (value: number): value is PacketType => KNOWN_PACKET_TYPES.has(value);

/**
 * Map a payload's first byte to its packet kind, or `null` when unknown.
 */
export const classifyPacket = (firstByte: number): PacketType | null => (isPacketType(firstByte) ? firstByte : null);

const decodeFailure = (what: string, length: number, min: number): MeshCoreError =>
    new MeshCoreError({
        message: `${what} too short: ${length} bytes (expected at least ${min})`,
        code: 'DECODE_ERROR',
        details: {length, min},
    });

const readU32 = (what: string) => (body: Buffer): number => {
    if (body.length < 4) throw decodeFailure(what, body.length, 4);
    return body.readUInt32LE(0);
};

const readKey = (what: string, body: Buffer): PublicKey => {
    if (body.length < PUBLIC_KEY_SIZE) throw decodeFailure(what, body.length, PUBLIC_KEY_SIZE);
    return PublicKey.fromBytes(body.subarray(0, PUBLIC_KEY_SIZE));
};

const copy = (body: Buffer): Buffer => Buffer.from(body);

const raw: PacketDecoder = (body, packetType) => ({type: 'raw', packetType, data: copy(body)});

const parseStats = (body: Buffer): StatsData | null => {
    if (body.length === 0) return null;
    const rest = body.subarray(1);
    switch (body.readUInt8(0)) {
        case StatsType.Core:
            return {kind: 'core', stats: parseCoreStats(rest)};
        case StatsType.Radio:
            return {kind: 'radio', stats: parseRadioStats(rest)};
        case StatsType.Packets:
            return {kind: 'packets', stats: parsePacketStats(rest)};
        default:
            return null;
    }
};

const DECODERS: Record<PacketType, PacketDecoder> = {
    [PacketType.Ok]: () => ({type: 'ok'}),
    [PacketType.Error]: (body) => ({type: 'error', message: body.toString('utf8')}),
    [PacketType.ContactStart]: (body) => ({
        type: 'contactListStart',
        count: body.length >= 4 ? body.readUInt32LE(0) : 0,
    }),
    [PacketType.Contact]: (body) => ({type: 'contact', contact: parseContact(body)}),
    [PacketType.ContactEnd]: (body) => ({
        type: 'contactListEnd',
        lastModified: body.length >= 4 ? body.readUInt32LE(0) : 0,
    }),
    [PacketType.SelfInfo]: (body) => ({type: 'selfInfo', selfInfo: parseSelfInfo(body)}),
    [PacketType.MsgSent]: (body) => {
        if (body.length < 9) throw decodeFailure('MsgSent', body.length, 9);
        return {type: 'messageSent', expectedAck: body.readUInt32LE(1), timeoutMs: body.readUInt32LE(5)};
    },
    [PacketType.ContactMsgRecv]: (body) => ({type: 'contactMessage', message: parseContactMessage(body, false), v3: false}),
    [PacketType.ContactMsgRecvV3]: (body) => ({type: 'contactMessage', message: parseContactMessage(body, true), v3: true}),
    [PacketType.ChannelMsgRecv]: (body) => ({type: 'channelMessage', message: parseChannelMessage(body, false), v3: false}),
    [PacketType.ChannelMsgRecvV3]: (body) => ({type: 'channelMessage', message: parseChannelMessage(body, true), v3: true}),
    [PacketType.CurrentTime]: (body) => ({type: 'currentTime', time: readU32('CurrentTime')(body)}),
    [PacketType.NoMoreMsgs]: () => ({type: 'noMoreMessages'}),
    [PacketType.ContactUri]: (body) => ({type: 'contactUri', uri: `meshcore://${body.toString('hex')}`}),
    [PacketType.Battery]: (body) => ({type: 'battery', battery: parseBattery(body)}),
    [PacketType.DeviceInfo]: (body) => ({type: 'deviceInfo', info: parseDeviceInfo(body)}),
    [PacketType.PrivateKey]: (body) => {
        if (body.length < PRIVATE_KEY_SIZE) throw decodeFailure('PrivateKey', body.length, PRIVATE_KEY_SIZE);
        return {type: 'privateKey', key: copy(body.subarray(0, PRIVATE_KEY_SIZE))};
    },
    [PacketType.Disabled]: () => ({type: 'disabled'}),
    [PacketType.ChannelInfo]: (body) => ({type: 'channelInfo', channel: parseChannel(body)}),
    [PacketType.SignStart]: (body) => {
        if (body.length < 5) throw decodeFailure('SignStart', body.length, 5);
        return {type: 'signStarted', maxLength: body.readUInt32LE(1)};
    },
    [PacketType.Signature]: (body) => {
        if (body.length === 0) throw decodeFailure('Signature', 0, 1);
        return {type: 'signature', signature: copy(body)};
    },
    [PacketType.CustomVars]: (body) => {
        const text = body.toString('utf8');
        return {type: 'customVars', raw: text, vars: parseCustomVars(text)};
    },
    [PacketType.Stats]: (body, packetType) => {
        const stats = parseStats(body);
        return stats ? {type: 'stats', stats} : raw(body, packetType);
    },
    [PacketType.BinaryReq]: raw,
    [PacketType.FactoryReset]: raw,
    [PacketType.PathDiscovery]: raw,
    [PacketType.SetFloodScope]: raw,
    [PacketType.SendControlData]: raw,
    [PacketType.Advertisement]: (body) => ({type: 'advertisement', publicKey: readKey('Advertisement', body)}),
    [PacketType.PathUpdate]: (body) => ({type: 'pathUpdate', publicKey: readKey('PathUpdate', body)}),
    [PacketType.Ack]: (body) => ({type: 'ack', code: readU32('Ack')(body)}),
    [PacketType.MessagesWaiting]: () => ({type: 'messagesWaiting'}),
    [PacketType.RawData]: (body) => ({type: 'rawData', data: copy(body)}),
    [PacketType.LoginSuccess]: () => ({type: 'loginSuccess'}),
    [PacketType.LoginFailed]: () => ({type: 'loginFailed'}),
    [PacketType.StatusResponse]: (body) => {
        // [reserved:1] precedes the status body
        if (body.length < 2) throw decodeFailure('StatusResponse', body.length, 2);
        return {type: 'statusResponse', status: parseDeviceStatus(body.subarray(1))};
    },
    [PacketType.LogData]: (body) => ({type: 'logData', text: body.toString('utf8')}),
    [PacketType.TraceData]: (body) => ({type: 'traceData', data: copy(body)}),
    [PacketType.PushNewAdvert]: (body) => ({type: 'newContactAdvert', contact: parseContact(body)}),
    [PacketType.TelemetryResponse]: (body) => {
        // [reserved:1] [key_prefix:6] [lpp...]
        const lppStart = 1 + PUBLIC_KEY_PREFIX_SIZE;
        if (body.length <= lppStart) {
            return {type: 'telemetryResponse', keyPrefix: null, telemetry: new Telemetry()};
        }
        return {
            type: 'telemetryResponse',
            keyPrefix: copy(body.subarray(1, lppStart)),
            telemetry: Telemetry.parse(body.subarray(lppStart)),
        };
    },
    [PacketType.BinaryResponse]: (body) => ({type: 'binaryResponse', data: copy(body)}),
    [PacketType.PathDiscoveryResponse]: (body) => ({type: 'pathDiscoveryResponse', data: copy(body)}),
    [PacketType.ControlData]: (body) => ({type: 'controlData', data: copy(body)}),
};

/**
 * Packet kinds that decode to each response event type. A `raw` event carrying
 * one of these kinds is a malformed instance of that response.
 */
export const RESPONSE_PACKET_TYPES: Partial<Record<MeshCoreEventType, readonly PacketType[]>> = {
    ok: [PacketType.Ok],
    error: [PacketType.Error],
    contactListStart: [PacketType.ContactStart],
    contact: [PacketType.Contact],
    contactListEnd: [PacketType.ContactEnd],
    selfInfo: [PacketType.SelfInfo],
    messageSent: [PacketType.MsgSent],
    contactMessage: [PacketType.ContactMsgRecv, PacketType.ContactMsgRecvV3],
    channelMessage: [PacketType.ChannelMsgRecv, PacketType.ChannelMsgRecvV3],
    currentTime: [PacketType.CurrentTime],
    noMoreMessages: [PacketType.NoMoreMsgs],
    contactUri: [PacketType.ContactUri],
    battery: [PacketType.Battery],
    deviceInfo: [PacketType.DeviceInfo],
    privateKey: [PacketType.PrivateKey],
    disabled: [PacketType.Disabled],
    channelInfo: [PacketType.ChannelInfo],
    signStarted: [PacketType.SignStart],
    signature: [PacketType.Signature],
    customVars: [PacketType.CustomVars],
    stats: [PacketType.Stats],
    telemetryResponse: [PacketType.TelemetryResponse],
};

/** Called when a known packet kind fails to decode and falls back to a raw event. */
export type DecodeErrorHandler = (error: MeshCoreError, packetType: number) => void;

/**
 * Decode one frame payload into exactly one event. Unknown kinds and
 * malformed bodies produce a `raw` event; nothing is thrown.
 */
export const decodePacket = (payload: Buffer, onDecodeError?: DecodeErrorHandler): MeshCoreEvent => {
    if (payload.length === 0) return {type: 'raw', packetType: null, data: Buffer.alloc(0)};

    const first = payload.readUInt8(0);
    const body = payload.subarray(1);
    const packetType = classifyPacket(first);
    if (packetType === null) return {type: 'raw', packetType: first, data: copy(body)};

    try {
        return DECODERS[packetType](body, packetType);
    } catch (err) {
        onDecodeError?.(wrapMeshCoreError(err, 'DECODE_ERROR', {packetType}), packetType);
        return raw(body, packetType);
    }
};
