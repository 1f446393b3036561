import {describe, expect, it} from 'vitest';

import {
    isContactHidden,
    isContactTrusted,
    isFloodRoute,
    PublicKey,
    telemetryModeFromByte,
    telemetryModeToByte,
    type Contact,
} from '../src';
import {keyBytes, keyOf} from './builders';

describe('PublicKey', () => {
    it('round-trips bytes and hex', () => {
        const key = keyOf(0x10);
        expect(key.toBuffer()).toEqual(keyBytes(0x10));
        expect(PublicKey.fromHex(key.toHex().toUpperCase()).equals(key)).toBe(true);
        expect(String(key)).toBe(keyBytes(0x10).toString('hex'));
    });

    it('rejects keys of the wrong size', () => {
        expect(() => PublicKey.fromBytes(Buffer.alloc(31))).toThrow(expect.objectContaining({code: 'INVALID_ARGUMENT'}));
        expect(() => PublicKey.fromHex('abcd')).toThrow(expect.objectContaining({code: 'INVALID_ARGUMENT'}));
        expect(() => PublicKey.fromHex('zz'.repeat(32))).toThrow(expect.objectContaining({code: 'INVALID_ARGUMENT'}));
    });

    it('exposes the six-byte wire prefix', () => {
        const key = keyOf(0x10);
        expect(key.prefix()).toEqual(Buffer.from([0x10, 0x11, 0x12, 0x13, 0x14, 0x15]));
        expect(key.prefixHex()).toBe('101112131415');
        expect(key.matchesPrefix(Buffer.from([0x10, 0x11, 0x12, 0x13, 0x14, 0x15]))).toBe(true);
        expect(key.matchesPrefix(Buffer.from([0x10, 0x12]))).toBe(false);
        expect(key.matchesPrefix(Buffer.alloc(0))).toBe(false);
    });

    it('copies its input', () => {
        const raw = keyBytes(0x10);
        const key = PublicKey.fromBytes(raw);
        raw[0] = 0xff;
        expect(key.prefix()[0]).toBe(0x10);
    });
});

describe('telemetry mode byte', () => {
    it('packs three two-bit fields', () => {
        expect(telemetryModeFromByte(0x26)).toEqual({environment: 2, location: 1, base: 2});
        expect(telemetryModeToByte({environment: 2, location: 1, base: 2})).toBe(0x26);
        expect(telemetryModeToByte({environment: 7, location: 0, base: 0})).toBe(0x30);
    });
});

describe('contact helpers', () => {
    const contact = (flags: number, pathLength: number): Contact => ({
        publicKey: keyOf(1),
        type: 1,
        flags,
        pathLength,
        path: Buffer.alloc(Math.max(pathLength, 0)),
        name: 'peer',
        lastAdvert: 0,
        latitude: null,
        longitude: null,
        lastModified: 0,
    });

    it('reads flag bits and flood routes', () => {
        expect(isContactTrusted(contact(0x01, 0))).toBe(true);
        expect(isContactHidden(contact(0x01, 0))).toBe(false);
        expect(isContactHidden(contact(0x03, 0))).toBe(true);
        expect(isFloodRoute(contact(0, -1))).toBe(true);
        expect(isFloodRoute(contact(0, 0))).toBe(false);
    });
});
