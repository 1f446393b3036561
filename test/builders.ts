import {PublicKey} from '../src';

export const u16le = (value: number): Buffer => {
    const buf = Buffer.alloc(2);
    buf.writeUInt16LE(value, 0);
    return buf;
};

export const u32le = (value: number): Buffer => {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value, 0);
    return buf;
};

export const i32le = (value: number): Buffer => {
    const buf = Buffer.alloc(4);
    buf.writeInt32LE(value, 0);
    return buf;
};

export const keyBytes = (seed: number): Buffer => Buffer.from(Array.from({length: 32}, (_, i) => (seed + i) & 0xff));

export const keyOf = (seed: number): PublicKey => PublicKey.fromBytes(keyBytes(seed));

/** Packet payload: kind byte followed by the given parts. */
export const packet = (kind: number, ...parts: Array<Buffer | number[]>): Buffer =>
    Buffer.concat([Buffer.from([kind]), ...parts.map((part) => (Buffer.isBuffer(part) ? part : Buffer.from(part)))]);

export type SelfInfoFixture = {
    seed?: number;
    name?: string;
    latitude?: number;
    longitude?: number;
};

/**
 * Self-info body: tx 22/30 dBm, lat 51.5, lon unset, 869.525 MHz / 250 kHz,
 * SF11 CR5, telemetry byte 0x26.
 */
export const selfInfoBody = (fixture: SelfInfoFixture = {}): Buffer => {
    const body = Buffer.alloc(57);
    body.writeUInt8(1, 0);
    body.writeUInt8(22, 1);
    body.writeUInt8(30, 2);
    keyBytes(fixture.seed ?? 0x10).copy(body, 3);
    body.writeInt32LE(fixture.latitude ?? 51500000, 35);
    body.writeInt32LE(fixture.longitude ?? 0, 39);
    body.writeUInt8(1, 43);
    body.writeUInt8(2, 44);
    body.writeUInt8(0x26, 45);
    body.writeUInt8(1, 46);
    body.writeUInt32LE(869525, 47);
    body.writeUInt32LE(250000, 51);
    body.writeUInt8(11, 55);
    body.writeUInt8(5, 56);
    return Buffer.concat([body, Buffer.from(fixture.name ?? 'base-node', 'utf8')]);
};

export type ContactFixture = {
    seed: number;
    name: string;
    type?: number;
    flags?: number;
    pathLength?: number;
    path?: number[];
    lastAdvert?: number;
    latitude?: number;
    longitude?: number;
    lastModified?: number;
};

export const contactBody = (fixture: ContactFixture): Buffer => {
    const body = Buffer.alloc(147);
    keyBytes(fixture.seed).copy(body, 0);
    body.writeUInt8(fixture.type ?? 1, 32);
    body.writeUInt8(fixture.flags ?? 0, 33);
    body.writeInt8(fixture.pathLength ?? -1, 34);
    Buffer.from(fixture.path ?? []).copy(body, 35);
    Buffer.from(fixture.name, 'utf8').copy(body, 99);
    body.writeUInt32LE(fixture.lastAdvert ?? 0, 131);
    body.writeInt32LE(fixture.latitude ?? 0, 135);
    body.writeInt32LE(fixture.longitude ?? 0, 139);
    body.writeUInt32LE(fixture.lastModified ?? 0, 143);
    return body;
};
