/**
 * Background read loop: transport bytes -> frames -> events.
 * @module core/FramePump
 */
import {decodePacket} from '../protocols/meshcore/decoder';
import {MeshCoreError, wrapMeshCoreError} from '../protocols/meshcore/errors';
import type {MeshCoreEvent} from '../protocols/meshcore/events';
import {FrameDecoder} from '../protocols/meshcore/frame';
import type {Logger} from '../logger';
import type {Transport} from '../transport/types';
import type {EventDispatcher} from './EventDispatcher';
import type {DeviceState} from './DeviceState';

/** Why the pump stopped. */
export type PumpExit =
    | {reason: 'stopped'}
    | {reason: 'closed'}
    | {reason: 'error'; error: MeshCoreError};

export type FramePumpOptions = {
    transport: Transport;
    dispatcher: EventDispatcher;
    state: DeviceState;
    logger: Logger;
    /** Called after each event is applied and dispatched. */
    onEvent?: (event: MeshCoreEvent) => void;
    decoder?: FrameDecoder;
};

/**
 * Sole writer of {@link DeviceState} and sole producer into the
 * {@link EventDispatcher}. For each frame the state update and the dispatch
 * happen in the same synchronous step.
 */
export class FramePump {
    private readonly transport: Transport;
    private readonly dispatcher: EventDispatcher;
    private readonly state: DeviceState;
    private readonly logger: Logger;
    private readonly onEvent?: (event: MeshCoreEvent) => void;
    private readonly decoder: FrameDecoder;
    private running = false;
    private stopRequested = false;
    private loop: Promise<PumpExit> | null = null;

    constructor(options: FramePumpOptions) {
        this.transport = options.transport;
        this.dispatcher = options.dispatcher;
        this.state = options.state;
        this.logger = options.logger;
        this.onEvent = options.onEvent;
        this.decoder = options.decoder ?? new FrameDecoder();
    }

    public get isRunning(): boolean {
        return this.running;
    }

    /**
     * Start pumping. The returned promise settles with the exit reason and
     * never rejects.
     */
    public start(): Promise<PumpExit> {
        if (this.loop) return this.loop;
        this.running = true;
        this.stopRequested = false;
        this.decoder.clear();
        this.loop = this.run().finally(() => {
            this.running = false;
            this.loop = null;
        });
        return this.loop;
    }

    /**
     * Ask the loop to stop. It exits once the pending `read()` returns, so the
     * transport is normally closed right after this call.
     */
    public stop(): Promise<PumpExit> | null {
        this.stopRequested = true;
        return this.loop;
    }

    /** Decode and publish one frame payload. */
    private handlePayload(payload: Buffer): void {
        const event = decodePacket(payload, (error, packetType) => {
            this.logger.debug('MeshCore packet decode failed, dispatching raw event', {
                packetType,
                length: payload.length,
                error: error.message,
            });
        });
        this.state.apply(event);
        this.dispatcher.dispatch(event);
        try {
            this.onEvent?.(event);
        } catch (err) {
            this.logger.warn('MeshCore event listener failed', {
                event: event.type,
                error: err instanceof Error ? err.message : String(err),
            });
        }
    }

    private async run(): Promise<PumpExit> {
        while (!this.stopRequested) {
            let chunk: Buffer | null;
            try {
                chunk = await this.transport.read();
            } catch (err) {
                if (this.stopRequested) break;
                const error = wrapMeshCoreError(err, 'TRANSPORT_ERROR');
                this.logger.error('MeshCore transport read failed', {error: error.message});
                return {reason: 'error', error};
            }
            if (chunk === null) {
                return this.stopRequested ? {reason: 'stopped'} : {reason: 'closed'};
            }

            this.decoder.feed(chunk);
            for (;;) {
                const result = this.decoder.tryDecode();
                if (result.status === 'incomplete') break;
                if (result.status === 'too_large') {
                    this.decoder.clear();
                    const error = new MeshCoreError({
                        message: `MeshCore frame too large: ${result.size} bytes`,
                        code: 'FRAME_TOO_LARGE',
                        details: {size: result.size},
                    });
                    this.logger.error('MeshCore frame error, resetting connection', {size: result.size});
                    return {reason: 'error', error};
                }
                this.handlePayload(result.payload);
            }
        }
        return {reason: 'stopped'};
    }
}
