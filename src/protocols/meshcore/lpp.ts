/**
 * Cayenne LPP telemetry decoder.
 * @module meshcore/lpp
 *
 * Each record is `[channel:1] [type:1] [value:N]`, values big-endian.
 */
import {LppType} from './constants';

export type Vector3 = {x: number; y: number; z: number};
export type Colour = {r: number; g: number; b: number};
export type GpsPosition = {latitude: number; longitude: number; altitude: number};

export type TelemetryReading =
    | {channel: number; type: number; kind: 'scalar'; value: number}
    | {channel: number; type: number; kind: 'vector'; value: Vector3}
    | {channel: number; type: number; kind: 'colour'; value: Colour}
    | {channel: number; type: number; kind: 'gps'; value: GpsPosition}
    | {channel: number; type: number; kind: 'generic'; value: Buffer};

type ScalarCodec = {size: number; read: (data: Buffer, offset: number) => number};

const u8 = (scale = 1): ScalarCodec => ({size: 1, read: (d, o) => d.readUInt8(o) / scale});
const u16 = (scale = 1): ScalarCodec => ({size: 2, read: (d, o) => d.readUInt16BE(o) / scale});
const i16 = (scale = 1): ScalarCodec => ({size: 2, read: (d, o) => d.readInt16BE(o) / scale});
const u32 = (): ScalarCodec => ({size: 4, read: (d, o) => d.readUInt32BE(o)});

const SCALAR_CODECS: Partial<Record<number, ScalarCodec>> = {
    [LppType.DigitalInput]: u8(),
    [LppType.DigitalOutput]: u8(),
    [LppType.AnalogInput]: i16(100),
    [LppType.AnalogOutput]: i16(100),
    [LppType.Illuminance]: u16(),
    [LppType.Presence]: u8(),
    [LppType.Temperature]: i16(10),
    [LppType.Humidity]: u8(2),
    [LppType.Barometer]: u16(10),
    [LppType.Voltage]: u16(100),
    [LppType.Current]: u16(1000),
    [LppType.Frequency]: u32(),
    [LppType.Percentage]: u8(),
    [LppType.Altitude]: i16(100),
    [LppType.Power]: u16(),
    [LppType.Distance]: u32(),
    [LppType.Energy]: u32(),
    [LppType.Direction]: u16(),
    [LppType.UnixTime]: u32(),
};

const VECTOR_SCALES: Partial<Record<number, number>> = {
    [LppType.Accelerometer]: 1000,
    [LppType.Gyrometer]: 100,
};

const VECTOR_SIZE = 6;
const COLOUR_SIZE = 3;
const GPS_SIZE = 9;

/**
 * Decode an LPP payload into readings, in order.
 *
 * A record that would run past the end of the buffer is dropped and ends the
 * scan. An unknown type consumes every remaining byte as one `generic` record.
 */
export const parseLpp = (data: Buffer | Uint8Array): TelemetryReading[] => {
    const buf = Buffer.isBuffer(data) ? data : Buffer.from(data);
    const readings: TelemetryReading[] = [];
    let pos = 0;

    while (pos + 2 <= buf.length) {
        const channel = buf.readUInt8(pos);
        const type = buf.readUInt8(pos + 1);
        const start = pos + 2;
        const remaining = buf.length - start;

        const scalar = SCALAR_CODECS[type];
        if (scalar) {
            if (remaining < scalar.size) break;
            readings.push({channel, type, kind: 'scalar', value: scalar.read(buf, start)});
            pos = start + scalar.size;
            continue;
        }

        const vectorScale = VECTOR_SCALES[type];
        if (vectorScale !== undefined) {
            if (remaining < VECTOR_SIZE) break;
            readings.push({
                channel,
                type,
                kind: 'vector',
                value: {
                    x: buf.readInt16BE(start) / vectorScale,
                    y: buf.readInt16BE(start + 2) / vectorScale,
                    z: buf.readInt16BE(start + 4) / vectorScale,
                },
            });
            pos = start + VECTOR_SIZE;
            continue;
        }

        if (type === LppType.Colour) {
            if (remaining < COLOUR_SIZE) break;
            readings.push({
                channel,
                type,
                kind: 'colour',
                value: {r: buf.readUInt8(start), g: buf.readUInt8(start + 1), b: buf.readUInt8(start + 2)},
            });
            pos = start + COLOUR_SIZE;
            continue;
        }

        if (type === LppType.Gps) {
            if (remaining < GPS_SIZE) break;
            readings.push({
                channel,
                type,
                kind: 'gps',
                value: {
                    latitude: buf.readIntBE(start, 3) / 1e4,
                    longitude: buf.readIntBE(start + 3, 3) / 1e4,
                    altitude: buf.readIntBE(start + 6, 3) / 100,
                },
            });
            pos = start + GPS_SIZE;
            continue;
        }

        if (remaining === 0) break;
        readings.push({channel, type, kind: 'generic', value: Buffer.from(buf.subarray(start))});
        break;
    }

    return readings;
};

const scalarOf = (reading: TelemetryReading | undefined): number | null =>
    reading?.kind === 'scalar' ? reading.value : null;

/**
 * Decoded telemetry with lookup helpers for common sensor types.
 */
export class Telemetry {
    constructor(public readonly readings: TelemetryReading[] = []) {}

    public static parse(data: Buffer | Uint8Array): Telemetry {
        return new Telemetry(parseLpp(data));
    }

    public get isEmpty(): boolean {
        return this.readings.length === 0;
    }

    public byChannel(channel: number): TelemetryReading[] {
        return this.readings.filter((r) => r.channel === channel);
    }

    public byType(type: LppType | number): TelemetryReading[] {
        return this.readings.filter((r) => r.type === type);
    }

    /** First temperature reading in °C. */
    public temperature(): number | null {
        return scalarOf(this.byType(LppType.Temperature)[0]);
    }

    /** First relative humidity reading in %. */
    public humidity(): number | null {
        return scalarOf(this.byType(LppType.Humidity)[0]);
    }

    /** First voltage reading in V. */
    public voltage(): number | null {
        return scalarOf(this.byType(LppType.Voltage)[0]);
    }

    public gps(): GpsPosition | null {
        const reading = this.byType(LppType.Gps)[0];
        return reading?.kind === 'gps' ? reading.value : null;
    }
}
