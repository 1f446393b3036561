/**
 * Client configuration defaults and environment overrides.
 * @module config
 */
import {
    MESHCORE_DEFAULT_BAUD_RATE,
    MESHCORE_DEFAULT_CLIENT_NAME,
    MESHCORE_DEFAULT_CONNECT_DELAY_MS,
    MESHCORE_DEFAULT_SETTLE_MS,
    MESHCORE_DEFAULT_SUBSCRIBER_CAPACITY,
    MESHCORE_DEFAULT_TIMEOUT_MS,
} from './protocols/meshcore/constants';

/**
 * Tunables shared by the client, command engine and dispatcher.
 */
export type MeshCoreConfig = {
    /** Default bound for every wait-for-response call. */
    timeoutMs: number;
    /** Delay after fire-and-forget writes. */
    settleMs: number;
    /** Delay between opening the transport and the app-start handshake. */
    connectDelayMs: number;
    /** Queued events per subscriber before the oldest is dropped. */
    subscriberCapacity: number;
    /** Name announced in the app-start handshake. */
    clientName: string;
};

/**
 * Serial settings read from the environment by the example scripts.
 */
export type SerialEnvConfig = {
    port: string | null;
    baudRate: number;
    debug: boolean;
};

export const DEFAULT_CONFIG: Readonly<MeshCoreConfig> = {
    timeoutMs: MESHCORE_DEFAULT_TIMEOUT_MS,
    settleMs: MESHCORE_DEFAULT_SETTLE_MS,
    connectDelayMs: MESHCORE_DEFAULT_CONNECT_DELAY_MS,
    subscriberCapacity: MESHCORE_DEFAULT_SUBSCRIBER_CAPACITY,
    clientName: MESHCORE_DEFAULT_CLIENT_NAME,
};

type Env = Record<string, string | undefined>;

const intFromEnv = (value: string | undefined, fallback: number): number => {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = parseInt(value, 10);
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

/**
 * Fill unset options from `MESHCORE_TIMEOUT_MS` and the built-in defaults.
 * Explicit options always win over the environment.
 */
export const resolveConfig = (options: Partial<MeshCoreConfig> = {}, env: Env = process.env): MeshCoreConfig => ({
    timeoutMs: options.timeoutMs ?? intFromEnv(env.MESHCORE_TIMEOUT_MS, DEFAULT_CONFIG.timeoutMs),
    settleMs: options.settleMs ?? DEFAULT_CONFIG.settleMs,
    connectDelayMs: options.connectDelayMs ?? DEFAULT_CONFIG.connectDelayMs,
    subscriberCapacity: Math.max(1, options.subscriberCapacity ?? DEFAULT_CONFIG.subscriberCapacity),
    clientName: options.clientName ?? DEFAULT_CONFIG.clientName,
});

/**
 * Read `MESHCORE_PORT`, `MESHCORE_BAUD_RATE` and `MESHCORE_DEBUG`.
 */
export const serialConfigFromEnv = (env: Env = process.env): SerialEnvConfig => ({
    port: env.MESHCORE_PORT && env.MESHCORE_PORT.trim() !== '' ? env.MESHCORE_PORT.trim() : null,
    baudRate: intFromEnv(env.MESHCORE_BAUD_RATE, MESHCORE_DEFAULT_BAUD_RATE) || MESHCORE_DEFAULT_BAUD_RATE,
    debug: env.MESHCORE_DEBUG === '1' || env.MESHCORE_DEBUG === 'true',
});
