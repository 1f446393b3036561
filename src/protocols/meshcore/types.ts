/**
 * MeshCore value types: keys, contacts, device descriptions and statistics.
 * @module meshcore/types
 */
import {ContactFlags, ContactType, PUBLIC_KEY_PREFIX_SIZE, PUBLIC_KEY_SIZE, TextType} from './constants';
import {invalidArgument} from './errors';

/**
 * 32-byte node identity. The first six bytes address peers in wire messages.
 */
export class PublicKey {
    private readonly bytes: Buffer;

    private constructor(bytes: Buffer) {
        this.bytes = bytes;
    }

    public static fromBytes(bytes: Buffer | Uint8Array): PublicKey {
        if (bytes.length !== PUBLIC_KEY_SIZE) {
            throw invalidArgument(`Public key must be ${PUBLIC_KEY_SIZE} bytes, got ${bytes.length}`);
        }
        return new PublicKey(Buffer.from(bytes));
    }

    public static fromHex(hex: string): PublicKey {
        const clean = hex.trim().toLowerCase();
        if (!/^[0-9a-f]*$/.test(clean) || clean.length !== PUBLIC_KEY_SIZE * 2) {
            throw invalidArgument(`Public key hex must be ${PUBLIC_KEY_SIZE * 2} hex characters`, {hex});
        }
        return new PublicKey(Buffer.from(clean, 'hex'));
    }

    public toBuffer(): Buffer {
        return Buffer.from(this.bytes);
    }

    public toHex(): string {
        return this.bytes.toString('hex');
    }

    public prefix(): Buffer {
        return Buffer.from(this.bytes.subarray(0, PUBLIC_KEY_PREFIX_SIZE));
    }

    public prefixHex(): string {
        return this.bytes.subarray(0, PUBLIC_KEY_PREFIX_SIZE).toString('hex');
    }

    public matchesPrefix(prefix: Buffer | Uint8Array): boolean {
        return prefix.length > 0
            && prefix.length <= PUBLIC_KEY_SIZE
            && this.bytes.subarray(0, prefix.length).equals(prefix);
    }

    public equals(other: PublicKey): boolean {
        return this.bytes.equals(other.bytes);
    }

    public toString(): string {
        return this.toHex();
    }
}

export type TelemetryMode = {
    environment: number;
    location: number;
    base: number;
};

export const telemetryModeFromByte = (value: number): TelemetryMode => ({
    environment: (value >> 4) & 0x03,
    location: (value >> 2) & 0x03,
    base: value & 0x03,
});

export const telemetryModeToByte = (mode: TelemetryMode): number =>
    ((mode.environment & 0x03) << 4) | ((mode.location & 0x03) << 2) | (mode.base & 0x03);

export type RadioConfig = {
    frequencyMhz: number;
    bandwidthKhz: number;
    spreadingFactor: number;
    codingRate: number;
};

export type SelfInfo = {
    advertType: number;
    txPower: number;
    maxTxPower: number;
    publicKey: PublicKey;
    /** Degrees, `null` when the device reports 0 (unset). */
    latitude: number | null;
    longitude: number | null;
    multiAcks: number;
    advertLocationPolicy: number;
    telemetryMode: TelemetryMode;
    manualAddContacts: boolean;
    radio: RadioConfig;
    name: string;
};

export type DeviceInfo = {
    firmwareVersion: number;
    maxContacts: number | null;
    maxChannels: number | null;
    blePin: number | null;
    firmwareBuild: string | null;
    model: string | null;
    version: string | null;
};

export type Contact = {
    publicKey: PublicKey;
    type: ContactType | number;
    flags: number;
    /** Negative means no fixed route (flood). */
    pathLength: number;
    path: Buffer;
    name: string;
    lastAdvert: number;
    latitude: number | null;
    longitude: number | null;
    lastModified: number;
};

export const isContactTrusted = (contact: Contact): boolean => (contact.flags & ContactFlags.Trusted) !== 0;
export const isContactHidden = (contact: Contact): boolean => (contact.flags & ContactFlags.Hidden) !== 0;
export const isFloodRoute = (contact: Contact): boolean => contact.pathLength < 0;

export type ContactMessage = {
    senderPrefix: Buffer;
    pathLength: number;
    textType: TextType;
    timestamp: number;
    /** Detached 4-byte signature for signed text. */
    signature: Buffer | null;
    text: string;
    /** dB, only reported by the v3 message format. */
    snr: number | null;
};

export type ChannelMessage = {
    channelIndex: number;
    pathLength: number;
    textType: TextType;
    timestamp: number;
    text: string;
    snr: number | null;
};

export type BatteryStatus = {
    millivolts: number;
    usedKb: number | null;
    totalKb: number | null;
};

export type Channel = {
    index: number;
    name: string;
    secret: Buffer;
};

export type DeviceStatus = {
    pubkeyPrefix: Buffer;
    batteryMv: number;
    txQueueLength: number;
    noiseFloor: number;
    lastRssi: number;
    packetsReceived: number;
    packetsSent: number;
    airtimeSecs: number;
    uptimeSecs: number;
    sentFlood: number;
    sentDirect: number;
    recvFlood: number;
    recvDirect: number;
    fullEvents: number;
    lastSnr: number;
    directDups: number;
    floodDups: number;
    rxAirtimeSecs: number;
};

export type CoreStats = {
    batteryMv: number;
    uptimeSecs: number;
    errors: number;
    queueLength: number;
};

export type RadioStats = {
    noiseFloor: number;
    lastRssi: number;
    lastSnr: number;
    txAirtimeSecs: number;
    rxAirtimeSecs: number;
};

export type PacketStats = {
    received: number;
    sent: number;
    floodTx: number;
    directTx: number;
    floodRx: number;
    directRx: number;
};

export type StatsData =
    | {kind: 'core'; stats: CoreStats}
    | {kind: 'radio'; stats: RadioStats}
    | {kind: 'packets'; stats: PacketStats};
