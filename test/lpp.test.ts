import {describe, expect, it} from 'vitest';

import {LppType, parseLpp, Telemetry} from '../src';

describe('parseLpp', () => {
    it('decodes temperature and humidity records', () => {
        expect(parseLpp(Buffer.from([0x01, 0x67, 0x00, 0xfa]))).toEqual([
            {channel: 1, type: LppType.Temperature, kind: 'scalar', value: 25},
        ]);
        expect(parseLpp(Buffer.from([0x02, 0x68, 0x64]))).toEqual([
            {channel: 2, type: LppType.Humidity, kind: 'scalar', value: 50},
        ]);
    });

    it('keeps concatenated records in order', () => {
        const readings = parseLpp(Buffer.from([0x01, 0x67, 0x00, 0xfa, 0x02, 0x68, 0x64]));
        expect(readings.map((r) => [r.channel, r.type, r.value])).toEqual([
            [1, 103, 25],
            [2, 104, 50],
        ]);
    });

    it('reads signed big-endian scalars', () => {
        expect(parseLpp(Buffer.from([0x01, 0x67, 0xff, 0x9c]))).toEqual([
            {channel: 1, type: LppType.Temperature, kind: 'scalar', value: -10},
        ]);
        expect(parseLpp(Buffer.from([0x03, 0x74, 0x01, 0x4a]))).toEqual([
            {channel: 3, type: LppType.Voltage, kind: 'scalar', value: 3.3},
        ]);
    });

    it('decodes three-axis, colour and gps records', () => {
        const readings = parseLpp(Buffer.from([
            0x00, 0x71, 0x03, 0xe8, 0xfc, 0x18, 0x00, 0x00,
            0x06, 0x87, 0x0a, 0x14, 0x1e,
            0x01, 0x88, 0x07, 0xdb, 0xb8, 0xff, 0xfc, 0x18, 0x00, 0x04, 0xd2,
        ]));
        expect(readings).toEqual([
            {channel: 0, type: LppType.Accelerometer, kind: 'vector', value: {x: 1, y: -1, z: 0}},
            {channel: 6, type: LppType.Colour, kind: 'colour', value: {r: 10, g: 20, b: 30}},
            {channel: 1, type: LppType.Gps, kind: 'gps', value: {latitude: 51.5, longitude: -0.1, altitude: 12.34}},
        ]);
    });

    it('drops a truncated trailing record', () => {
        expect(parseLpp(Buffer.from([0x01, 0x67, 0x00, 0xfa, 0x03, 0x67, 0x01]))).toEqual([
            {channel: 1, type: LppType.Temperature, kind: 'scalar', value: 25},
        ]);
        expect(parseLpp(Buffer.from([0x01, 0x88, 0x00, 0x00]))).toEqual([]);
        expect(parseLpp(Buffer.from([0x01]))).toEqual([]);
    });

    it('lets an unknown type swallow the rest of the payload', () => {
        const readings = parseLpp(Buffer.from([0x01, 0x67, 0x00, 0xfa, 0x04, 0xf0, 0x01, 0x02, 0x02, 0x68, 0x64]));
        expect(readings).toEqual([
            {channel: 1, type: LppType.Temperature, kind: 'scalar', value: 25},
            {channel: 4, type: 0xf0, kind: 'generic', value: Buffer.from([0x01, 0x02, 0x02, 0x68, 0x64])},
        ]);
        expect(parseLpp(Buffer.from([0x05, 0xf0]))).toEqual([]);
    });

    it('accepts plain Uint8Array input', () => {
        expect(parseLpp(new Uint8Array([0x02, 0x68, 0x64]))).toHaveLength(1);
    });
});

describe('Telemetry', () => {
    it('looks up readings by type and channel', () => {
        const telemetry = Telemetry.parse(Buffer.from([0x01, 0x67, 0x00, 0xfa, 0x02, 0x68, 0x64]));
        expect(telemetry.isEmpty).toBe(false);
        expect(telemetry.temperature()).toBe(25);
        expect(telemetry.humidity()).toBe(50);
        expect(telemetry.voltage()).toBeNull();
        expect(telemetry.gps()).toBeNull();
        expect(telemetry.byChannel(2)).toEqual([{channel: 2, type: LppType.Humidity, kind: 'scalar', value: 50}]);
        expect(telemetry.byType(LppType.Temperature)).toHaveLength(1);
    });

    it('returns the first gps fix', () => {
        const telemetry = Telemetry.parse(Buffer.from([0x01, 0x88, 0x07, 0xdb, 0xb8, 0xff, 0xfc, 0x18, 0x00, 0x04, 0xd2]));
        expect(telemetry.gps()).toEqual({latitude: 51.5, longitude: -0.1, altitude: 12.34});
        expect(new Telemetry().isEmpty).toBe(true);
    });
});
