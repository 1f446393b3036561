import {describe, expect, it} from 'vitest';

import {
    encodeFrame,
    FrameDecoder,
    MESHCORE_FRAME_MARKER_IN,
    MESHCORE_FRAME_MARKER_OUT,
    MESHCORE_MAX_FRAME_SIZE,
} from '../src';

const payloadOf = (length: number): Buffer => {
    const payload = Buffer.alloc(length);
    for (let i = 0; i < length; i++) payload[i] = (i * 7 + 3) & 0xff;
    return payload;
};

describe('encodeFrame', () => {
    it('writes marker, little-endian length and payload', () => {
        expect(encodeFrame(Buffer.from([0x16, 0x03]))).toEqual(Buffer.from([0x3c, 0x02, 0x00, 0x16, 0x03]));
        expect(encodeFrame(payloadOf(0x0102)).subarray(0, 3)).toEqual(Buffer.from([MESHCORE_FRAME_MARKER_OUT, 0x02, 0x01]));
    });

    it('rejects payloads over the length field', () => {
        expect(() => encodeFrame(Buffer.alloc(MESHCORE_MAX_FRAME_SIZE + 1))).toThrow(RangeError);
        expect(encodeFrame(Buffer.alloc(MESHCORE_MAX_FRAME_SIZE))).toHaveLength(MESHCORE_MAX_FRAME_SIZE + 3);
    });
});

describe('FrameDecoder', () => {
    it('returns exactly the encoded payload with nothing left over', () => {
        for (const length of [0, 1, 57, 300, MESHCORE_MAX_FRAME_SIZE]) {
            const decoder = new FrameDecoder();
            const payload = payloadOf(length);
            decoder.feed(encodeFrame(payload));

            const result = decoder.tryDecode();
            expect(result).toEqual({status: 'complete', payload});
            expect(decoder.buffered).toBe(0);
            expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
        }
    });

    it('stays incomplete until a split frame is fully buffered', () => {
        const decoder = new FrameDecoder();
        const payload = payloadOf(10);
        const frame = encodeFrame(payload);

        for (let i = 0; i < frame.length - 1; i++) {
            decoder.feed(frame.subarray(i, i + 1));
            expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
            expect(decoder.buffered).toBe(i + 1);
        }
        decoder.feed(frame.subarray(frame.length - 1));
        expect(decoder.tryDecode()).toEqual({status: 'complete', payload});
    });

    it('handles uneven chunk boundaries', () => {
        const decoder = new FrameDecoder();
        const payload = payloadOf(40);
        const frame = encodeFrame(payload);

        decoder.feed(frame.subarray(0, 2));
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
        decoder.feed(frame.subarray(2, 20));
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
        decoder.feed(frame.subarray(20));
        expect(decoder.tryDecode()).toEqual({status: 'complete', payload});
    });

    it('drains several frames from one chunk in arrival order', () => {
        const decoder = new FrameDecoder();
        const first = Buffer.from([0x00]);
        const second = Buffer.from([0x82, 0x05, 0x00, 0x00, 0x00]);
        decoder.feed(Buffer.concat([encodeFrame(first), encodeFrame(second), Buffer.from([0x3e, 0x04])]));

        expect(decoder.tryDecode()).toEqual({status: 'complete', payload: first});
        expect(decoder.tryDecode()).toEqual({status: 'complete', payload: second});
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
        expect(decoder.buffered).toBe(2);
    });

    it('reports too_large from the header alone', () => {
        const decoder = new FrameDecoder(100);
        decoder.feed(Buffer.from([MESHCORE_FRAME_MARKER_IN, 101, 0x00]));
        expect(decoder.tryDecode()).toEqual({status: 'too_large', size: 101});

        decoder.clear();
        decoder.feed(Buffer.from([MESHCORE_FRAME_MARKER_IN, 100, 0x00]));
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
    });

    it('waits for the largest legal frame instead of rejecting it', () => {
        const decoder = new FrameDecoder();
        decoder.feed(Buffer.from([MESHCORE_FRAME_MARKER_IN, 0xff, 0xff, 0x01]));
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
    });

    it('ignores the marker byte', () => {
        const payload = Buffer.from([0x0c, 0x10, 0x0e]);
        for (const marker of [MESHCORE_FRAME_MARKER_IN, MESHCORE_FRAME_MARKER_OUT, 0x00, 0xff]) {
            const decoder = new FrameDecoder();
            decoder.feed(Buffer.from([marker, 0x03, 0x00, 0x0c, 0x10, 0x0e]));
            expect(decoder.tryDecode()).toEqual({status: 'complete', payload});
        }
    });

    it('returns payloads that do not alias the input', () => {
        const decoder = new FrameDecoder();
        const frame = encodeFrame(Buffer.from([0x01, 0x02]));
        decoder.feed(frame);
        const result = decoder.tryDecode();
        frame[3] = 0xff;
        expect(result).toEqual({status: 'complete', payload: Buffer.from([0x01, 0x02])});
    });

    it('clear drops partial data', () => {
        const decoder = new FrameDecoder();
        decoder.feed(Buffer.from([0x3e, 0x05, 0x00, 0x01]));
        decoder.feed(Buffer.alloc(0));
        expect(decoder.buffered).toBe(4);
        decoder.clear();
        expect(decoder.buffered).toBe(0);
        expect(decoder.tryDecode()).toEqual({status: 'incomplete'});
    });
});
