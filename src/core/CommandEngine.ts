/**
 * Command/response correlation over the shared event stream.
 * @module core/CommandEngine
 */
import {
    encodeAppStart,
    encodeBinaryRequest,
    encodeDeviceQuery,
    encodeExportContact,
    encodeExportPrivateKey,
    encodeGetBattery,
    encodeGetChannel,
    encodeGetContacts,
    encodeGetCustomVars,
    encodeGetMessage,
    encodeGetSelfTelemetry,
    encodeGetStats,
    encodeGetTime,
    encodeImportContact,
    encodeImportPrivateKey,
    encodeNeighboursRequest,
    encodeNodeDiscover,
    encodePathDiscovery,
    encodeReboot,
    encodeRemoveContact,
    encodeResetPath,
    encodeSendAdvert,
    encodeSendChannelMessage,
    encodeSendCommand,
    encodeSendLogin,
    encodeSendLogout,
    encodeSendMessage,
    encodeSendStatusRequest,
    encodeSendTrace,
    encodeSetChannel,
    encodeSetCoords,
    encodeSetCustomVar,
    encodeSetDevicePin,
    encodeSetFloodScope,
    encodeSetName,
    encodeSetOtherParams,
    encodeSetRadio,
    encodeSetTime,
    encodeSetTuning,
    encodeSetTxPower,
    encodeShareContact,
    encodeSignData,
    encodeSignFinish,
    encodeSignStart,
    encodeTelemetryRequest,
    encodeUpdateContact,
    floodScopeKeyForTopic,
    nowSeconds,
    type ContactUpdate,
    type NeighboursQuery,
    type NodeDiscoverParams,
    type OtherParams,
    type RadioParams,
} from '../protocols/meshcore/commands';
import {BinaryReqType, FLOOD_SCOPE_KEY_SIZE, StatsType} from '../protocols/meshcore/constants';
import {RESPONSE_PACKET_TYPES} from '../protocols/meshcore/decoder';
import {MeshCoreError, notConnectedError, wrapMeshCoreError} from '../protocols/meshcore/errors';
import type {
    AckEvent,
    EventOf,
    MeshCoreEvent,
    MeshCoreEventType,
    MessageSentEvent,
} from '../protocols/meshcore/events';
import {encodeFrame} from '../protocols/meshcore/frame';
import type {PublicKey, StatsData} from '../protocols/meshcore/types';
import type {Logger} from '../logger';
import type {Transport} from '../transport/types';
import type {EventDispatcher, Subscription} from './EventDispatcher';

export type CommandEngineOptions = {
    transport: Transport;
    dispatcher: EventDispatcher;
    logger: Logger;
    timeoutMs: number;
    settleMs: number;
    clientName: string;
};

const STATS_KIND: Record<StatsType, StatsData['kind']> = {
    [StatsType.Core]: 'core',
    [StatsType.Radio]: 'radio',
    [StatsType.Packets]: 'packets',
};

/**
 * A response wait whose subscription is already live. The command can only be
 * written through {@link PendingResponse.send}, so the response can never be
 * dispatched before somebody is listening for it.
 */
export class PendingResponse<T extends MeshCoreEventType> {
    private readonly subscription: Subscription;
    private readonly rawPacketTypes: Set<number>;
    private used = false;

    /** @internal Created through {@link CommandEngine.expect}. */
    constructor(
        private readonly engine: CommandEngine,
        dispatcher: EventDispatcher,
        private readonly types: readonly T[],
        private readonly timeoutMs: number,
    ) {
        this.rawPacketTypes = new Set(types.flatMap((type) => RESPONSE_PACKET_TYPES[type] ?? []));
        this.subscription = dispatcher.subscribe({filter: (event) => this.isRelevant(event)});
    }

    /**
     * Write the command and resolve with the first event of an expected type.
     *
     * - device `error` packet: rejects with `DEVICE_ERROR`
     * - malformed instance of an expected type: rejects with `UNEXPECTED_RESPONSE`
     * - nothing within the bound: rejects with `RESPONSE_TIMEOUT`
     */
    public async send(payload: Buffer): Promise<EventOf<T>> {
        if (this.used) {
            throw new MeshCoreError({message: 'PendingResponse already sent', code: 'INVALID_ARGUMENT'});
        }
        this.used = true;
        try {
            await this.engine.write(payload);
            const event = await this.subscription.waitFor((e) => this.isRelevant(e), this.timeoutMs);
            return this.accept(event);
        } finally {
            this.subscription.close();
        }
    }

    /** Drop the subscription without sending. */
    public cancel(): void {
        this.subscription.close();
    }

    private isRelevant(event: MeshCoreEvent): boolean {
        if (event.type === 'error') return true;
        if (event.type === 'raw') return event.packetType !== null && this.rawPacketTypes.has(event.packetType);
        return this.isExpected(event);
    }

    private isExpected(event: MeshCoreEvent): event is EventOf<T> {
        return this.types.some((type) => type === event.type);
    }

    private accept(event: MeshCoreEvent): EventOf<T> {
        if (this.isExpected(event)) return event;
        if (event.type === 'error') {
            throw new MeshCoreError({
                message: `Device rejected command: ${event.message || 'unknown error'}`,
                code: 'DEVICE_ERROR',
                details: {deviceMessage: event.message},
            });
        }
        throw unexpectedResponse(event, this.types);
    }
}

/**
 * Live subscription to acknowledgement pushes, opened before the command
 * that triggers them.
 */
export class AckWatch {
    private readonly subscription: Subscription;

    /** @internal Created through {@link CommandEngine.watchAcks}. */
    constructor(dispatcher: EventDispatcher) {
        this.subscription = dispatcher.subscribe({filter: (event) => event.type === 'ack'});
    }

    /** Wait for the ack carrying exactly `code`. */
    public wait(code: number, timeoutMs: number): Promise<AckEvent> {
        return this.subscription.waitFor((event): event is AckEvent => event.type === 'ack' && event.code === code, timeoutMs);
    }

    public close(): void {
        this.subscription.close();
    }
}

const unexpectedResponse = (event: MeshCoreEvent, expected: readonly string[]): MeshCoreError =>
    new MeshCoreError({
        message: `Unexpected response ${event.type}${event.type === 'raw' ? ` (packet 0x${(event.packetType ?? 0).toString(16)})` : ''}, expected ${expected.join('|')}`,
        code: 'UNEXPECTED_RESPONSE',
        details: {received: event.type, expected},
    });

/**
 * Encodes commands, writes them under a single write lock, and correlates
 * them with responses through the dispatcher using one of three patterns:
 * wait-for-shape ({@link CommandEngine.request}), fire-and-forget
 * ({@link CommandEngine.sendAndSettle}) and ack-tag
 * ({@link CommandEngine.waitForAck}).
 */
export class CommandEngine {
    private readonly transport: Transport;
    private readonly dispatcher: EventDispatcher;
    private readonly logger: Logger;
    private readonly clientName: string;
    private timeoutMs: number;
    private readonly settleMs: number;
    private writeQueue: Promise<void> = Promise.resolve();
    private tag = 0;

    constructor(options: CommandEngineOptions) {
        this.transport = options.transport;
        this.dispatcher = options.dispatcher;
        this.logger = options.logger;
        this.timeoutMs = options.timeoutMs;
        this.settleMs = options.settleMs;
        this.clientName = options.clientName;
    }

    public get defaultTimeoutMs(): number {
        return this.timeoutMs;
    }

    public setDefaultTimeout(timeoutMs: number): void {
        this.timeoutMs = timeoutMs;
    }

    /** Next caller-correlation tag; starts at 1 and skips 0 on wrap. */
    public nextTag(): number {
        this.tag = (this.tag + 1) >>> 0;
        if (this.tag === 0) this.tag = 1;
        return this.tag;
    }

    /** Encode with the next tag; the counter only advances when encoding succeeds. */
    private encodeTagged(encode: (tag: number) => Buffer): {payload: Buffer; tag: number} {
        const tag = ((this.tag + 1) >>> 0) || 1;
        const payload = encode(tag);
        this.tag = tag;
        return {payload, tag};
    }

    /**
     * Frame and write one payload. Writes from concurrent commands are
     * serialized; the lock is held only for the write itself.
     */
    public write(payload: Buffer): Promise<void> {
        if (!this.transport.isConnected()) return Promise.reject(notConnectedError());
        const frame = encodeFrame(payload);
        const current = this.writeQueue.then(() => this.transport.send(frame));
        // failures reach the caller through `current`
        this.writeQueue = current.then(() => undefined, () => undefined);
        return current.catch((err: unknown) => {
            throw wrapMeshCoreError(err, 'TRANSPORT_ERROR', {opcode: payload[0]});
        });
    }

    /** Open a response wait for the given event types. */
    public expect<T extends MeshCoreEventType>(types: readonly T[], timeoutMs = this.timeoutMs): PendingResponse<T> {
        return new PendingResponse(this, this.dispatcher, types, timeoutMs);
    }

    /** Wait-for-shape: subscribe, write, await one of `types`. */
    public request<T extends MeshCoreEventType>(
        payload: Buffer,
        types: readonly T[],
        timeoutMs = this.timeoutMs,
    ): Promise<EventOf<T>> {
        return this.expect(types, timeoutMs).send(payload);
    }

    /** Wait-for-shape expecting a bare `ok`. */
    public async requestOk(payload: Buffer, timeoutMs = this.timeoutMs): Promise<void> {
        await this.request(payload, ['ok'], timeoutMs);
    }

    /** Fire-and-forget: write, then wait the settle delay. */
    public async sendAndSettle(payload: Buffer): Promise<void> {
        await this.write(payload);
        await new Promise((resolve) => setTimeout(resolve, this.settleMs));
    }

    /** Subscribe to acks ahead of the command that will produce them. */
    public watchAcks(): AckWatch {
        return new AckWatch(this.dispatcher);
    }

    /** Ack-tag: wait for an `ack` push with exactly `code`. */
    public waitForAck(code: number, timeoutMs = this.timeoutMs): Promise<AckEvent> {
        return this.dispatcher.waitFor((event): event is AckEvent => event.type === 'ack' && event.code === code, timeoutMs);
    }

    // Device

    public async appStart() {
        return this.request(encodeAppStart(this.clientName), ['selfInfo']);
    }

    public async getTime() {
        return this.request(encodeGetTime(), ['currentTime']);
    }

    public async setTime(timestamp = nowSeconds()): Promise<void> {
        return this.sendAndSettle(encodeSetTime(timestamp));
    }

    public async getBattery() {
        return this.request(encodeGetBattery(), ['battery']);
    }

    public async deviceQuery() {
        return this.request(encodeDeviceQuery(), ['deviceInfo']);
    }

    public async sendAdvert(flood = false): Promise<void> {
        return this.requestOk(encodeSendAdvert(flood));
    }

    public async setName(name: string): Promise<void> {
        return this.sendAndSettle(encodeSetName(name));
    }

    /** Rejects with `INVALID_ARGUMENT` before writing when out of range. */
    public async setCoords(latitude: number, longitude: number): Promise<void> {
        const payload = encodeSetCoords(latitude, longitude);
        await this.sendAndSettle(payload);
    }

    public async setTxPower(dbm: number): Promise<void> {
        return this.sendAndSettle(encodeSetTxPower(dbm));
    }

    public async setRadio(params: RadioParams): Promise<void> {
        await this.sendAndSettle(encodeSetRadio(params));
    }

    public async setTuning(rxDelay: number, airtimeFactor: number): Promise<void> {
        await this.sendAndSettle(encodeSetTuning(rxDelay, airtimeFactor));
    }

    public async setDevicePin(pin: number): Promise<void> {
        await this.sendAndSettle(encodeSetDevicePin(pin));
    }

    public async setOtherParams(params: OtherParams): Promise<void> {
        await this.sendAndSettle(encodeSetOtherParams(params));
    }

    public async reboot(): Promise<void> {
        return this.requestOk(encodeReboot());
    }

    public async exportPrivateKey() {
        return this.request(encodeExportPrivateKey(), ['privateKey', 'disabled']);
    }

    public async importPrivateKey(key: Buffer | Uint8Array): Promise<void> {
        await this.requestOk(encodeImportPrivateKey(key));
    }

    /** Rejects with `UNEXPECTED_RESPONSE` when the device answers another stats kind. */
    public async getStats(type: StatsType) {
        const event = await this.request(encodeGetStats(type), ['stats']);
        if (event.stats.kind !== STATS_KIND[type]) throw unexpectedResponse(event, [`stats:${STATS_KIND[type]}`]);
        return event;
    }

    public async getCustomVars() {
        return this.request(encodeGetCustomVars(), ['customVars']);
    }

    public async setCustomVar(key: string, value: string): Promise<void> {
        await this.sendAndSettle(encodeSetCustomVar(key, value));
    }

    // Contacts

    /**
     * Request the contact list and resolve with the end marker. Individual
     * `contact` events flow through the dispatcher and the contact cache.
     */
    public async getContacts(since?: number) {
        return this.request(encodeGetContacts(since), ['contactListEnd']);
    }

    public async updateContact(update: ContactUpdate): Promise<void> {
        await this.requestOk(encodeUpdateContact(update));
    }

    public async removeContact(key: PublicKey): Promise<void> {
        await this.requestOk(encodeRemoveContact(key));
    }

    public async resetPath(key: PublicKey): Promise<void> {
        await this.requestOk(encodeResetPath(key));
    }

    public async shareContact(key: PublicKey): Promise<void> {
        await this.requestOk(encodeShareContact(key));
    }

    /** Export a contact card URI; without a key the device exports itself. */
    public async exportContact(key?: PublicKey) {
        return this.request(encodeExportContact(key), ['contactUri']);
    }

    public async importContact(card: Buffer | Uint8Array): Promise<void> {
        await this.requestOk(encodeImportContact(card));
    }

    // Messaging

    public async sendMessage(destination: PublicKey, text: string, attempt = 0, timestamp = nowSeconds()): Promise<MessageSentEvent> {
        return this.request(encodeSendMessage(destination, text, attempt, timestamp), ['messageSent']);
    }

    public async sendCommand(destination: PublicKey, text: string, timestamp = nowSeconds()): Promise<MessageSentEvent> {
        return this.request(encodeSendCommand(destination, text, timestamp), ['messageSent']);
    }

    public async sendChannelMessage(channelIndex: number, text: string, timestamp = nowSeconds()): Promise<void> {
        await this.requestOk(encodeSendChannelMessage(channelIndex, text, timestamp));
    }

    public async getMessage() {
        return this.request(encodeGetMessage(), ['contactMessage', 'channelMessage', 'noMoreMessages']);
    }

    /** `loginSuccess`/`loginFailed` arrive later as pushes. */
    public async sendLogin(destination: PublicKey, password: string): Promise<MessageSentEvent> {
        return this.request(encodeSendLogin(destination, password), ['messageSent']);
    }

    public async sendLogout(destination: PublicKey): Promise<void> {
        await this.requestOk(encodeSendLogout(destination));
    }

    /** The `statusResponse` push arrives later. */
    public async sendStatusRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.request(encodeSendStatusRequest(destination), ['messageSent']);
    }

    // Channels

    public async getChannel(index: number) {
        return this.request(encodeGetChannel(index), ['channelInfo']);
    }

    public async setChannel(index: number, name: string, secret: Buffer | Uint8Array): Promise<void> {
        await this.sendAndSettle(encodeSetChannel(index, name, secret));
    }

    // Binary requests

    public async binaryRequest(destination: PublicKey, type: BinaryReqType, data?: Buffer | Uint8Array): Promise<MessageSentEvent> {
        return this.request(encodeBinaryRequest(destination, type, data), ['messageSent']);
    }

    public async binaryStatusRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.binaryRequest(destination, BinaryReqType.Status);
    }

    public async binaryKeepAlive(destination: PublicKey): Promise<MessageSentEvent> {
        return this.binaryRequest(destination, BinaryReqType.KeepAlive);
    }

    public async binaryTelemetryRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.binaryRequest(destination, BinaryReqType.Telemetry);
    }

    public async binaryMmaRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.binaryRequest(destination, BinaryReqType.Mma);
    }

    public async binaryAclRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.binaryRequest(destination, BinaryReqType.Acl);
    }

    /** Neighbour list request; the tag comes from {@link CommandEngine.nextTag}. */
    public async binaryNeighboursRequest(destination: PublicKey, query: NeighboursQuery): Promise<MessageSentEvent> {
        const {payload} = this.encodeTagged((tag) => encodeNeighboursRequest(destination, query, tag));
        return this.request(payload, ['messageSent']);
    }

    // Telemetry and paths

    public async getSelfTelemetry() {
        return this.request(encodeGetSelfTelemetry(), ['telemetryResponse']);
    }

    public async sendTelemetryRequest(destination: PublicKey): Promise<MessageSentEvent> {
        return this.request(encodeTelemetryRequest(destination), ['messageSent']);
    }

    public async pathDiscovery(destination: PublicKey): Promise<MessageSentEvent> {
        return this.request(encodePathDiscovery(destination), ['messageSent']);
    }

    public async sendTrace(params: {authCode: number; tag?: number; flags?: number; path?: Buffer | Uint8Array}): Promise<MessageSentEvent> {
        const {payload} = params.tag === undefined
            ? this.encodeTagged((tag) => encodeSendTrace({...params, tag}))
            : {payload: encodeSendTrace({...params, tag: params.tag})};
        return this.request(payload, ['messageSent']);
    }

    public async setFloodScope(scopeKey: Buffer | Uint8Array): Promise<void> {
        await this.requestOk(encodeSetFloodScope(scopeKey));
    }

    public async setFloodScopeTopic(topic: string): Promise<void> {
        return this.setFloodScope(floodScopeKeyForTopic(topic));
    }

    public async clearFloodScope(): Promise<void> {
        return this.setFloodScope(Buffer.alloc(FLOOD_SCOPE_KEY_SIZE));
    }

    public async nodeDiscover(params: Omit<NodeDiscoverParams, 'tag'> & {tag?: number}): Promise<number> {
        const {payload, tag} = params.tag === undefined
            ? this.encodeTagged((next) => encodeNodeDiscover({...params, tag: next}))
            : {payload: encodeNodeDiscover({...params, tag: params.tag}), tag: params.tag};
        await this.requestOk(payload);
        return tag;
    }

    // Signing

    public async signStart() {
        return this.request(encodeSignStart(), ['signStarted']);
    }

    public async signData(chunk: Buffer | Uint8Array): Promise<void> {
        await this.requestOk(encodeSignData(chunk));
    }

    public async signFinish() {
        return this.request(encodeSignFinish(), ['signature']);
    }

    /** Write a raw, already encoded payload and wait for one of `types`. */
    public async sendRaw<T extends MeshCoreEventType>(payload: Buffer, types: readonly T[], timeoutMs = this.timeoutMs) {
        this.logger.debug('MeshCore raw command', {opcode: payload[0], length: payload.length});
        return this.request(payload, types, timeoutMs);
    }
}
