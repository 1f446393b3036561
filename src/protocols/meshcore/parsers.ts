/**
 * Per-layout body parsers. Each takes the packet body (after the kind byte)
 * and throws a `DECODE_ERROR` when the body is shorter than its layout.
 * @module meshcore/parsers
 */
import {
    CHANNEL_NAME_SIZE,
    CHANNEL_SECRET_SIZE,
    CONTACT_NAME_SIZE,
    CONTACT_PATH_SIZE,
    COORDINATE_SCALE,
    PUBLIC_KEY_PREFIX_SIZE,
    PUBLIC_KEY_SIZE,
    SNR_SCALE,
    TextType,
} from './constants';
import {MeshCoreError} from './errors';
import {
    type BatteryStatus,
    type Channel,
    type ChannelMessage,
    type Contact,
    type ContactMessage,
    type CoreStats,
    type DeviceInfo,
    type DeviceStatus,
    type PacketStats,
    PublicKey,
    type RadioStats,
    type SelfInfo,
    telemetryModeFromByte,
} from './types';

const SELF_INFO_MIN_SIZE = 57;
const DEVICE_INFO_EXTENDED_SIZE = 79;
const CONTACT_SIZE = 147;
const DEVICE_STATUS_SIZE = 58;
const V3_PREFIX_SIZE = 3;

const ensureLength = (data: Buffer, min: number, what: string): void => {
    if (data.length < min) {
        throw new MeshCoreError({
            message: `${what} too short: ${data.length} bytes (expected at least ${min})`,
            code: 'DECODE_ERROR',
            details: {length: data.length, min},
        });
    }
};

/**
 * Decode a zero- or length-terminated UTF-8 field. Invalid sequences become U+FFFD.
 */
export const parseString = (data: Buffer, maxLength: number): string => {
    const field = data.subarray(0, maxLength);
    const nul = field.indexOf(0);
    return (nul === -1 ? field : field.subarray(0, nul)).toString('utf8');
};

/** Scaled coordinate; 0 means unset. */
export const parseCoord = (raw: number): number | null => (raw === 0 ? null : raw / COORDINATE_SCALE);

const parseTextType = (value: number): TextType => {
    switch (value) {
        case TextType.Command:
            return TextType.Command;
        case TextType.Signed:
            return TextType.Signed;
        default:
            return TextType.Plain;
    }
};

export const parseSelfInfo = (data: Buffer): SelfInfo => {
    ensureLength(data, SELF_INFO_MIN_SIZE, 'SelfInfo');
    return {
        advertType: data.readUInt8(0),
        txPower: data.readUInt8(1),
        maxTxPower: data.readUInt8(2),
        publicKey: PublicKey.fromBytes(data.subarray(3, 35)),
        latitude: parseCoord(data.readInt32LE(35)),
        longitude: parseCoord(data.readInt32LE(39)),
        multiAcks: data.readUInt8(43),
        advertLocationPolicy: data.readUInt8(44),
        telemetryMode: telemetryModeFromByte(data.readUInt8(45)),
        manualAddContacts: data.readUInt8(46) !== 0,
        radio: {
            frequencyMhz: data.readUInt32LE(47) / 1000,
            bandwidthKhz: data.readUInt32LE(51) / 1000,
            spreadingFactor: data.readUInt8(55),
            codingRate: data.readUInt8(56),
        },
        name: parseString(data.subarray(SELF_INFO_MIN_SIZE), 32),
    };
};

export const parseDeviceInfo = (data: Buffer): DeviceInfo => {
    ensureLength(data, 1, 'DeviceInfo');
    const firmwareVersion = data.readUInt8(0);
    if (firmwareVersion < 3 || data.length < DEVICE_INFO_EXTENDED_SIZE) {
        return {
            firmwareVersion,
            maxContacts: null,
            maxChannels: null,
            blePin: null,
            firmwareBuild: null,
            model: null,
            version: null,
        };
    }
    return {
        firmwareVersion,
        maxContacts: data.readUInt8(1) * 2,
        maxChannels: data.readUInt8(2),
        blePin: data.readUInt32LE(3),
        firmwareBuild: parseString(data.subarray(7, 19), 12),
        model: parseString(data.subarray(19, 59), 40),
        version: parseString(data.subarray(59, 79), 20),
    };
};

export const parseContact = (data: Buffer): Contact => {
    ensureLength(data, CONTACT_SIZE, 'Contact');
    const pathLength = data.readInt8(34);
    const pathBytes = Math.min(Math.max(pathLength, 0), CONTACT_PATH_SIZE);
    return {
        publicKey: PublicKey.fromBytes(data.subarray(0, PUBLIC_KEY_SIZE)),
        type: data.readUInt8(32),
        flags: data.readUInt8(33),
        pathLength,
        path: Buffer.from(data.subarray(35, 35 + pathBytes)),
        name: parseString(data.subarray(99, 99 + CONTACT_NAME_SIZE), CONTACT_NAME_SIZE),
        lastAdvert: data.readUInt32LE(131),
        latitude: parseCoord(data.readInt32LE(135)),
        longitude: parseCoord(data.readInt32LE(139)),
        lastModified: data.readUInt32LE(143),
    };
};

/**
 * Private message, v1 `[prefix:6] [path_len:1] [txt_type:1] [ts:4] [text]`;
 * v3 prepends `[snr:1] [reserved:2]`.
 */
export const parseContactMessage = (data: Buffer, v3: boolean): ContactMessage => {
    const base = v3 ? V3_PREFIX_SIZE : 0;
    ensureLength(data, base + 12, v3 ? 'ContactMessage v3' : 'ContactMessage');
    const snr = v3 ? data.readInt8(0) / SNR_SCALE : null;
    const textType = parseTextType(data.readUInt8(base + 7));
    const textStart = base + 12;

    let signature: Buffer | null = null;
    let text: string;
    if (textType === TextType.Signed && data.length > textStart + 4) {
        signature = Buffer.from(data.subarray(textStart, textStart + 4));
        text = data.subarray(textStart + 4).toString('utf8');
    } else {
        text = data.subarray(textStart).toString('utf8');
    }

    return {
        senderPrefix: Buffer.from(data.subarray(base, base + PUBLIC_KEY_PREFIX_SIZE)),
        pathLength: data.readInt8(base + 6),
        textType,
        timestamp: data.readUInt32LE(base + 8),
        signature,
        text,
        snr,
    };
};

/**
 * Channel message, v1 `[channel:1] [path_len:1] [txt_type:1] [ts:4] [text]`;
 * v3 prepends `[snr:1] [reserved:2]`.
 */
export const parseChannelMessage = (data: Buffer, v3: boolean): ChannelMessage => {
    const base = v3 ? V3_PREFIX_SIZE : 0;
    ensureLength(data, base + 7, v3 ? 'ChannelMessage v3' : 'ChannelMessage');
    return {
        channelIndex: data.readUInt8(base),
        pathLength: data.readInt8(base + 1),
        textType: parseTextType(data.readUInt8(base + 2)),
        timestamp: data.readUInt32LE(base + 3),
        text: data.subarray(base + 7).toString('utf8'),
        snr: v3 ? data.readInt8(0) / SNR_SCALE : null,
    };
};

export const parseBattery = (data: Buffer): BatteryStatus => {
    ensureLength(data, 2, 'Battery');
    const hasStorage = data.length >= 10;
    return {
        millivolts: data.readUInt16LE(0),
        usedKb: hasStorage ? data.readUInt32LE(2) : null,
        totalKb: hasStorage ? data.readUInt32LE(6) : null,
    };
};

export const parseChannel = (data: Buffer): Channel => {
    const end = 1 + CHANNEL_NAME_SIZE + CHANNEL_SECRET_SIZE;
    ensureLength(data, end, 'Channel');
    return {
        index: data.readUInt8(0),
        name: parseString(data.subarray(1, 1 + CHANNEL_NAME_SIZE), CHANNEL_NAME_SIZE),
        secret: Buffer.from(data.subarray(1 + CHANNEL_NAME_SIZE, end)),
    };
};

export const parseDeviceStatus = (data: Buffer): DeviceStatus => {
    ensureLength(data, DEVICE_STATUS_SIZE, 'DeviceStatus');
    return {
        pubkeyPrefix: Buffer.from(data.subarray(0, PUBLIC_KEY_PREFIX_SIZE)),
        batteryMv: data.readUInt16LE(6),
        txQueueLength: data.readUInt16LE(8),
        noiseFloor: data.readInt16LE(10),
        lastRssi: data.readInt16LE(12),
        packetsReceived: data.readUInt32LE(14),
        packetsSent: data.readUInt32LE(18),
        airtimeSecs: data.readUInt32LE(22),
        uptimeSecs: data.readUInt32LE(26),
        sentFlood: data.readUInt32LE(30),
        sentDirect: data.readUInt32LE(34),
        recvFlood: data.readUInt32LE(38),
        recvDirect: data.readUInt32LE(42),
        fullEvents: data.readUInt16LE(46),
        lastSnr: data.readInt16LE(48) / SNR_SCALE,
        directDups: data.readUInt16LE(50),
        floodDups: data.readUInt16LE(52),
        rxAirtimeSecs: data.readUInt32LE(54),
    };
};

export const parseCoreStats = (data: Buffer): CoreStats => {
    ensureLength(data, 9, 'CoreStats');
    return {
        batteryMv: data.readUInt16LE(0),
        uptimeSecs: data.readUInt32LE(2),
        errors: data.readUInt16LE(6),
        queueLength: data.readUInt8(8),
    };
};

export const parseRadioStats = (data: Buffer): RadioStats => {
    ensureLength(data, 12, 'RadioStats');
    return {
        noiseFloor: data.readInt16LE(0),
        lastRssi: data.readInt8(2),
        lastSnr: data.readInt8(3) / SNR_SCALE,
        txAirtimeSecs: data.readUInt32LE(4),
        rxAirtimeSecs: data.readUInt32LE(8),
    };
};

export const parsePacketStats = (data: Buffer): PacketStats => {
    ensureLength(data, 24, 'PacketStats');
    return {
        received: data.readUInt32LE(0),
        sent: data.readUInt32LE(4),
        floodTx: data.readUInt32LE(8),
        directTx: data.readUInt32LE(12),
        floodRx: data.readUInt32LE(16),
        directRx: data.readUInt32LE(20),
    };
};

/**
 * Split a `key:value,key:value` custom-variable listing.
 */
export const parseCustomVars = (text: string): Record<string, string> => {
    const vars: Record<string, string> = {};
    for (const entry of text.split(',')) {
        const sep = entry.indexOf(':');
        if (sep <= 0) continue;
        vars[entry.slice(0, sep).trim()] = entry.slice(sep + 1).trim();
    }
    return vars;
};
