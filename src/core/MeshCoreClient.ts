/**
 * High-level MeshCore companion-radio client.
 * @module core/MeshCoreClient
 */
import {EventEmitter} from 'events';

import {resolveConfig, type MeshCoreConfig} from '../config';
import {silentLogger, type Logger} from '../logger';
import {nowSeconds} from '../protocols/meshcore/commands';
import {StatsType} from '../protocols/meshcore/constants';
import {MeshCoreError, wrapMeshCoreError} from '../protocols/meshcore/errors';
import type {ChannelMessageEvent, ContactMessageEvent, MeshCoreEvent} from '../protocols/meshcore/events';
import {FrameDecoder} from '../protocols/meshcore/frame';
import type {Telemetry} from '../protocols/meshcore/lpp';
import type {
    BatteryStatus,
    Channel,
    Contact,
    CoreStats,
    DeviceInfo,
    PacketStats,
    PublicKey,
    RadioStats,
    SelfInfo,
} from '../protocols/meshcore/types';
import type {Transport} from '../transport/types';
import {CommandEngine} from './CommandEngine';
import {DeviceState} from './DeviceState';
import {EventDispatcher, type SubscribeOptions, type Subscription} from './EventDispatcher';
import {FramePump, type PumpExit} from './FramePump';

/**
 * Configuration for a {@link MeshCoreClient}.
 */
export type MeshCoreClientOptions = Partial<MeshCoreConfig> & {
    /** Byte channel to the device, usually a {@link SerialTransport}. */
    transport: Transport;
    /** Defaults to a silent logger. */
    logger?: Logger;
    /** Largest accepted inbound frame. Defaults to the protocol maximum. */
    maxFrameSize?: number;
};

/**
 * Typed event map emitted by {@link MeshCoreClient}.
 */
export interface MeshCoreClientEvents {
    /** Emitted once the app-start handshake succeeds. */
    connect: [selfInfo: SelfInfo];
    /** Emitted after teardown, whether requested or caused by connection loss. */
    disconnect: [hadError: boolean];
    /** Emitted for every dispatched event, synthetic ones included. */
    event: [event: MeshCoreEvent];
    /** Emitted when the connection is lost to a transport or frame error. */
    error: [error: MeshCoreError];
}

export type SendMessageOptions = {
    /** Retry counter carried in the message. Default: 0. */
    attempt?: number;
    /** Sender timestamp in seconds. Default: now. */
    timestamp?: number;
    /** Ack wait bound. Defaults to the device's suggested timeout. */
    ackTimeoutMs?: number;
};

export type ReceivedMessage = ContactMessageEvent | ChannelMessageEvent;

const statsMismatch = (expected: string, received: string): MeshCoreError => new MeshCoreError({
    message: `Unexpected stats kind ${received}, expected ${expected}`,
    code: 'UNEXPECTED_RESPONSE',
    details: {expected, received},
});

/**
 * Owns the transport, frame pump, dispatcher, device state and command
 * engine for one device connection.
 *
 * ```ts
 * const client = new MeshCoreClient({transport: new SerialTransport({path: '/dev/ttyUSB0'})});
 * const self = await client.connect();
 * const battery = await client.getBattery();
 * await client.disconnect();
 * ```
 */
export class MeshCoreClient extends EventEmitter<MeshCoreClientEvents> {
    private readonly config: MeshCoreConfig;
    private readonly transport: Transport;
    private readonly logger: Logger;
    private readonly dispatcher: EventDispatcher;
    private readonly state = new DeviceState();
    private readonly pump: FramePump;
    private readonly engine: CommandEngine;

    private connected = false;
    private connectPromise: Promise<SelfInfo> | null = null;

    constructor(options: MeshCoreClientOptions) {
        super();
        this.config = resolveConfig(options);
        this.transport = options.transport;
        this.logger = options.logger ?? silentLogger;
        this.dispatcher = new EventDispatcher(this.config.subscriberCapacity, this.logger);
        this.pump = new FramePump({
            transport: this.transport,
            dispatcher: this.dispatcher,
            state: this.state,
            logger: this.logger,
            decoder: new FrameDecoder(options.maxFrameSize),
            onEvent: (event) => this.emit('event', event),
        });
        this.engine = new CommandEngine({
            transport: this.transport,
            dispatcher: this.dispatcher,
            logger: this.logger,
            timeoutMs: this.config.timeoutMs,
            settleMs: this.config.settleMs,
            clientName: this.config.clientName,
        });
    }

    /** Low-level command access. */
    public get commands(): CommandEngine {
        return this.engine;
    }

    public isConnected(): boolean {
        return this.connected && this.transport.isConnected();
    }

    /**
     * Open the transport, start the frame pump and run the app-start
     * handshake. Resolves with the device self description.
     */
    public async connect(): Promise<SelfInfo> {
        const current = this.connected ? this.state.getSelfInfo() : null;
        if (current) return current;
        if (this.connectPromise) return this.connectPromise;

        this.connectPromise = this.connectInternal();
        try {
            return await this.connectPromise;
        } finally {
            this.connectPromise = null;
        }
    }

    /**
     * Stop the pump, close the transport and end every subscription with
     * `closed`.
     */
    public async disconnect(): Promise<void> {
        if (!this.connected && !this.pump.isRunning) return;
        this.connected = false;

        const loop = this.pump.stop();
        let failure: MeshCoreError | null = null;
        try {
            await this.transport.disconnect();
        } catch (err) {
            failure = wrapMeshCoreError(err, 'TRANSPORT_ERROR');
        } finally {
            if (loop) await loop;
        }

        this.publish({type: 'disconnected'});
        this.dispatcher.closeAll();
        this.emit('disconnect', failure !== null);
        this.logger.info('MeshCore disconnected');
        if (failure) throw failure;
    }

    /** Live feed of every event dispatched from now on. */
    public subscribe(options?: SubscribeOptions): Subscription {
        return this.dispatcher.subscribe(options);
    }

    public getSelfInfo(): SelfInfo | null {
        return this.state.getSelfInfo();
    }

    /** Cached contacts keyed by lowercase public key hex. */
    public getContacts(): Map<string, Contact> {
        return this.state.getContacts();
    }

    public getContact(key: PublicKey | string): Contact | null {
        return this.state.getContact(key);
    }

    /** Resolve the sender of a contact message from its key prefix. */
    public findContactByPrefix(prefix: Buffer | Uint8Array): Contact | null {
        return this.state.findContactByPrefix(prefix);
    }

    public findContactByName(name: string): Contact | null {
        return this.state.findContactByName(name);
    }

    public async getBattery(): Promise<BatteryStatus> {
        return (await this.engine.getBattery()).battery;
    }

    public async getDeviceInfo(): Promise<DeviceInfo> {
        return (await this.engine.deviceQuery()).info;
    }

    /** Device clock in epoch seconds. */
    public async getTime(): Promise<number> {
        return (await this.engine.getTime()).time;
    }

    /** Set the device clock to `timestamp` (default: now) and return it. */
    public async syncTime(timestamp = nowSeconds()): Promise<number> {
        await this.engine.setTime(timestamp);
        return timestamp;
    }

    public async getCoreStats(): Promise<CoreStats> {
        const {stats} = await this.engine.getStats(StatsType.Core);
        if (stats.kind !== 'core') throw statsMismatch('core', stats.kind);
        return stats.stats;
    }

    public async getRadioStats(): Promise<RadioStats> {
        const {stats} = await this.engine.getStats(StatsType.Radio);
        if (stats.kind !== 'radio') throw statsMismatch('radio', stats.kind);
        return stats.stats;
    }

    public async getPacketStats(): Promise<PacketStats> {
        const {stats} = await this.engine.getStats(StatsType.Packets);
        if (stats.kind !== 'packets') throw statsMismatch('packets', stats.kind);
        return stats.stats;
    }

    /**
     * Download the contact list. Contacts land in the cache as they arrive;
     * resolves with the cache snapshot once the end marker is seen.
     */
    public async fetchContacts(since?: number): Promise<Map<string, Contact>> {
        const end = await this.engine.getContacts(since);
        this.logger.debug('MeshCore contact list received', {
            contacts: this.state.contactCount,
            lastModified: end.lastModified,
        });
        return this.state.getContacts();
    }

    /**
     * Send a direct message and wait for its delivery ack.
     * @returns The ack code that confirmed delivery.
     */
    public async sendMessage(destination: PublicKey, text: string, options: SendMessageOptions = {}): Promise<number> {
        const acks = this.engine.watchAcks();
        try {
            const sent = await this.engine.sendMessage(destination, text, options.attempt ?? 0, options.timestamp ?? nowSeconds());
            const timeoutMs = options.ackTimeoutMs ?? (sent.timeoutMs > 0 ? sent.timeoutMs : this.engine.defaultTimeoutMs);
            await acks.wait(sent.expectedAck, timeoutMs);
            return sent.expectedAck;
        } finally {
            acks.close();
        }
    }

    public sendChannelMessage(channelIndex: number, text: string, timestamp = nowSeconds()): Promise<void> {
        return this.engine.sendChannelMessage(channelIndex, text, timestamp);
    }

    /** Pull queued messages until the device reports none left. */
    public async fetchMessages(): Promise<ReceivedMessage[]> {
        const messages: ReceivedMessage[] = [];
        for (;;) {
            const event = await this.engine.getMessage();
            if (event.type === 'noMoreMessages') return messages;
            messages.push(event);
        }
    }

    public async getChannel(index: number): Promise<Channel> {
        return (await this.engine.getChannel(index)).channel;
    }

    /**
     * Ask a remote node for its status. The answer arrives later as a
     * `statusResponse` event.
     * @returns The expected ack code.
     */
    public async requestRemoteStatus(destination: PublicKey): Promise<number> {
        return (await this.engine.sendStatusRequest(destination)).expectedAck;
    }

    /**
     * Ask a remote node for telemetry. The answer arrives later as a
     * `telemetryResponse` event.
     * @returns The expected ack code.
     */
    public async requestRemoteTelemetry(destination: PublicKey): Promise<number> {
        return (await this.engine.sendTelemetryRequest(destination)).expectedAck;
    }

    public async getSelfTelemetry(): Promise<Telemetry> {
        return (await this.engine.getSelfTelemetry()).telemetry;
    }

    private async connectInternal(): Promise<SelfInfo> {
        try {
            await this.transport.connect();
        } catch (err) {
            throw wrapMeshCoreError(err, 'TRANSPORT_ERROR');
        }

        this.pump.start()
            .catch((err: unknown): PumpExit => ({reason: 'error', error: wrapMeshCoreError(err, 'TRANSPORT_ERROR')}))
            .then((exit) => this.handlePumpExit(exit))
            .catch((err: unknown) => {
                this.logger.error('MeshCore teardown failed', {error: err});
            });

        try {
            await new Promise((resolve) => setTimeout(resolve, this.config.connectDelayMs));
            const {selfInfo} = await this.engine.appStart();
            this.connected = true;
            this.publish({type: 'connected'});
            this.logger.info('MeshCore connected', {name: selfInfo.name, publicKey: selfInfo.publicKey.toHex()});
            this.emit('connect', selfInfo);
            return selfInfo;
        } catch (err) {
            const loop = this.pump.stop();
            await this.transport.disconnect().catch((closeErr: unknown) => {
                this.logger.warn('MeshCore transport close failed', {error: closeErr});
            });
            if (loop) await loop;
            throw err;
        }
    }

    /** Connection loss: the pump ended without being asked to. */
    private async handlePumpExit(exit: PumpExit): Promise<void> {
        if (exit.reason === 'stopped') return;

        const wasConnected = this.connected;
        this.connected = false;
        this.logger.warn('MeshCore connection lost', {reason: exit.reason});
        this.publish({type: 'disconnected'});
        this.dispatcher.closeAll();
        if (exit.reason === 'error' && this.listenerCount('error') > 0) this.emit('error', exit.error);
        if (wasConnected) this.emit('disconnect', exit.reason === 'error');

        try {
            await this.transport.disconnect();
        } catch (err) {
            this.logger.warn('MeshCore transport close failed', {error: err});
        }
    }

    private publish(event: MeshCoreEvent): void {
        this.dispatcher.dispatch(event);
        this.emitEvent(event);
    }

    private emitEvent(event: MeshCoreEvent): void {
        try {
            this.emit('event', event);
        } catch (err) {
            this.logger.warn('MeshCore event listener failed', {
                event: event.type,
                error: err instanceof Error ? err.message : String(err),
            });
        }
    }
}
