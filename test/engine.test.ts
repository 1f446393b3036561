import {afterEach, describe, expect, it, vi} from 'vitest';

import {
    CommandEngine,
    CommandOpcode,
    DeviceState,
    encodeReboot,
    encodeSetTime,
    EventDispatcher,
    FramePump,
    PacketType,
    type PumpExit,
    silentLogger,
    StatsType,
} from '../src';
import {keyOf, packet, u16le, u32le} from './builders';
import {FakeTransport} from './fake-transport';

type Harness = {
    transport: FakeTransport;
    dispatcher: EventDispatcher;
    pump: FramePump;
    engine: CommandEngine;
    loop: Promise<PumpExit>;
};

const open: Harness[] = [];

const setup = async (options: {timeoutMs?: number; settleMs?: number} = {}): Promise<Harness> => {
    const transport = new FakeTransport();
    const dispatcher = new EventDispatcher();
    const pump = new FramePump({transport, dispatcher, state: new DeviceState(), logger: silentLogger});
    const engine = new CommandEngine({
        transport,
        dispatcher,
        logger: silentLogger,
        timeoutMs: options.timeoutMs ?? 1000,
        settleMs: options.settleMs ?? 0,
        clientName: 'mccli',
    });
    await transport.connect();
    const harness = {transport, dispatcher, pump, engine, loop: pump.start()};
    open.push(harness);
    return harness;
};

const answer = (opcode: CommandOpcode, ...payloads: Buffer[]) => (payload: Buffer): Buffer[] | void =>
    (payload[0] === opcode ? payloads : undefined);

describe('CommandEngine', () => {
    afterEach(async () => {
        vi.useRealTimers();
        for (const {pump, transport, loop} of open.splice(0, open.length)) {
            pump.stop();
            await transport.disconnect();
            await loop;
        }
    });

    it('resolves with the first event of the expected type', async () => {
        const {transport, engine, dispatcher} = await setup();
        transport.respond = answer(
            CommandOpcode.GetBattery,
            packet(PacketType.Ack, u32le(9)),
            packet(PacketType.MessagesWaiting),
            packet(PacketType.Battery, u16le(3900), u32le(10), u32le(200)),
        );

        await expect(engine.getBattery()).resolves.toEqual({
            type: 'battery',
            battery: {millivolts: 3900, usedKb: 10, totalKb: 200},
        });
        expect(transport.payloads).toEqual([Buffer.from([0x14])]);
        expect(dispatcher.subscriberCount).toBe(0);
    });

    it('maps a device error packet to DEVICE_ERROR', async () => {
        const {transport, engine} = await setup();
        transport.respond = answer(CommandOpcode.GetTime, packet(PacketType.Error, Buffer.from('bad command')));

        await expect(engine.getTime()).rejects.toMatchObject({
            domain: 'protocol',
            code: 'DEVICE_ERROR',
            message: 'Device rejected command: bad command',
            details: {deviceMessage: 'bad command'},
        });
    });

    it('rejects a malformed response of the expected kind', async () => {
        const {transport, engine} = await setup();
        transport.respond = answer(CommandOpcode.GetBattery, packet(PacketType.Battery, [0x01]));

        await expect(engine.getBattery()).rejects.toMatchObject({
            code: 'UNEXPECTED_RESPONSE',
            message: 'Unexpected response raw (packet 0xc), expected battery',
            details: {received: 'raw', expected: ['battery']},
        });
    });

    it('rejects stats of another kind', async () => {
        const {transport, engine} = await setup();
        transport.respond = answer(CommandOpcode.GetStats, packet(PacketType.Stats, [StatsType.Radio], Buffer.alloc(12)));

        await expect(engine.getStats(StatsType.Core)).rejects.toMatchObject({
            code: 'UNEXPECTED_RESPONSE',
            details: {received: 'stats', expected: ['stats:core']},
        });
    });

    it('times out when nothing matching arrives', async () => {
        vi.useFakeTimers();
        const {transport, engine, dispatcher} = await setup({timeoutMs: 1000});
        transport.respond = answer(CommandOpcode.GetTime, packet(PacketType.Ok));

        const assertion = expect(engine.getTime()).rejects.toMatchObject({
            domain: 'timeout',
            code: 'RESPONSE_TIMEOUT',
            timeoutMs: 1000,
        });
        await vi.advanceTimersByTimeAsync(1000);
        await assertion;
        expect(dispatcher.subscriberCount).toBe(0);
    });

    it('fails fast when the transport is closed', async () => {
        const {transport, engine, dispatcher} = await setup();
        await transport.disconnect();

        await expect(engine.getTime()).rejects.toMatchObject({domain: 'connection', code: 'NOT_CONNECTED'});
        expect(transport.payloads).toHaveLength(0);
        expect(dispatcher.subscriberCount).toBe(0);
    });

    it('wraps write failures and keeps the write queue usable', async () => {
        const {transport, engine} = await setup();
        transport.sendError = new Error('write failed');

        await expect(engine.getTime()).rejects.toMatchObject({
            domain: 'transport',
            code: 'TRANSPORT_ERROR',
            message: 'write failed',
            details: {opcode: CommandOpcode.GetTime},
        });

        transport.sendError = null;
        transport.respond = answer(CommandOpcode.GetTime, packet(PacketType.CurrentTime, u32le(1700000000)));
        await expect(engine.getTime()).resolves.toEqual({type: 'currentTime', time: 1700000000});
    });

    it('serializes concurrent writes in call order', async () => {
        const {transport, engine} = await setup();
        await Promise.all([
            engine.write(Buffer.from([0x01])),
            engine.write(Buffer.from([0x02])),
            engine.write(Buffer.from([0x03])),
        ]);

        expect(transport.maxInFlight).toBe(1);
        expect(transport.payloads).toEqual([Buffer.from([0x01]), Buffer.from([0x02]), Buffer.from([0x03])]);
    });

    it('waits the settle delay after fire-and-forget writes', async () => {
        vi.useFakeTimers();
        const {transport, engine} = await setup({settleMs: 50});
        let settled = false;
        const done = engine.setTime(1700000000).then(() => {
            settled = true;
        });

        await vi.advanceTimersByTimeAsync(49);
        expect(settled).toBe(false);
        expect(transport.payloads).toEqual([encodeSetTime(1700000000)]);

        await vi.advanceTimersByTimeAsync(1);
        await done;
        expect(settled).toBe(true);
    });

    it('validates coordinates before writing', async () => {
        const {transport, engine} = await setup();
        await expect(engine.setCoords(91, 0)).rejects.toMatchObject({code: 'INVALID_ARGUMENT'});
        expect(transport.payloads).toHaveLength(0);
    });

    it('rejects invalid arguments rather than throwing', async () => {
        const {transport, engine} = await setup();
        const pending = engine.getChannel(300);
        expect(pending).toBeInstanceOf(Promise);
        await expect(pending).rejects.toMatchObject({
            code: 'INVALID_ARGUMENT',
            message: 'index must be an integer 0-255, got 300',
        });
        await expect(engine.sendChannelMessage(-1, 'hi')).rejects.toMatchObject({code: 'INVALID_ARGUMENT'});
        expect(transport.payloads).toHaveLength(0);
    });

    it('keeps the tag counter when a tagged command fails validation', async () => {
        const {transport, engine} = await setup();
        await expect(engine.binaryNeighboursRequest(keyOf(0x30), {maxResults: 300}))
            .rejects.toMatchObject({code: 'INVALID_ARGUMENT'});
        await expect(engine.nodeDiscover({filter: 256})).rejects.toMatchObject({code: 'INVALID_ARGUMENT'});
        expect(transport.payloads).toHaveLength(0);
        expect(engine.nextTag()).toBe(1);
    });

    it('hands out correlation tags from one counter', async () => {
        const {transport, engine} = await setup();
        transport.respond = (payload) => {
            if (payload[0] === CommandOpcode.BinaryReq) return [packet(PacketType.MsgSent, [0x00], u32le(0x1234), u32le(2500))];
            if (payload[0] === CommandOpcode.SendControlData) return [packet(PacketType.Ok)];
            return undefined;
        };

        const sent = await engine.binaryNeighboursRequest(keyOf(0x30), {maxResults: 10});
        expect(sent).toEqual({type: 'messageSent', expectedAck: 0x1234, timeoutMs: 2500});
        const request = transport.payloads[0];
        expect(request.readUInt32LE(request.length - 4)).toBe(1);

        await expect(engine.nodeDiscover({filter: 0x04})).resolves.toBe(2);
        expect(engine.nextTag()).toBe(3);
    });

    it('catches an ack that arrives with the send confirmation', async () => {
        const {transport, engine, dispatcher} = await setup();
        transport.respond = answer(
            CommandOpcode.SendMessage,
            packet(PacketType.MsgSent, [0x00], u32le(77), u32le(3000)),
            packet(PacketType.Ack, u32le(76)),
            packet(PacketType.Ack, u32le(77)),
        );

        const acks = engine.watchAcks();
        const sent = await engine.sendMessage(keyOf(0x30), 'hi', 0, 1700000000);
        await expect(acks.wait(sent.expectedAck, 1000)).resolves.toEqual({type: 'ack', code: 77});
        acks.close();
        expect(dispatcher.subscriberCount).toBe(0);
    });

    it('sends a pending response once', async () => {
        const {transport, engine, dispatcher} = await setup();
        transport.respond = () => [packet(PacketType.Ok)];

        const pending = engine.expect(['ok']);
        expect(dispatcher.subscriberCount).toBe(1);
        await expect(pending.send(encodeReboot())).resolves.toEqual({type: 'ok'});
        await expect(pending.send(encodeReboot())).rejects.toMatchObject({code: 'INVALID_ARGUMENT'});
        expect(transport.payloads).toHaveLength(1);

        const cancelled = engine.expect(['ok']);
        expect(dispatcher.subscriberCount).toBe(1);
        cancelled.cancel();
        expect(dispatcher.subscriberCount).toBe(0);
    });

    it('sends raw payloads', async () => {
        const {transport, engine} = await setup();
        transport.respond = answer(CommandOpcode.GetTime, packet(PacketType.CurrentTime, u32le(42)));
        await expect(engine.sendRaw(Buffer.from([CommandOpcode.GetTime]), ['currentTime'])).resolves.toEqual({
            type: 'currentTime',
            time: 42,
        });
    });
});
