/**
 * Structured MeshCore error taxonomy.
 * @module meshcore/errors
 */
export type MeshCoreErrorDomain =
    | 'transport'
    | 'frame'
    | 'decode'
    | 'protocol'
    | 'timeout'
    | 'connection'
    | 'validation';

export type MeshCoreErrorCode =
    | 'TRANSPORT_ERROR'
    | 'FRAME_TOO_LARGE'
    | 'DECODE_ERROR'
    | 'DEVICE_ERROR'
    | 'UNEXPECTED_RESPONSE'
    | 'RESPONSE_TIMEOUT'
    | 'NOT_CONNECTED'
    | 'CHANNEL_CLOSED'
    | 'INVALID_ARGUMENT';

const DOMAIN_BY_CODE: Record<MeshCoreErrorCode, MeshCoreErrorDomain> = {
    TRANSPORT_ERROR: 'transport',
    FRAME_TOO_LARGE: 'frame',
    DECODE_ERROR: 'decode',
    DEVICE_ERROR: 'protocol',
    UNEXPECTED_RESPONSE: 'protocol',
    RESPONSE_TIMEOUT: 'timeout',
    NOT_CONNECTED: 'connection',
    CHANNEL_CLOSED: 'connection',
    INVALID_ARGUMENT: 'validation',
};

export class MeshCoreError extends Error {
    public readonly domain: MeshCoreErrorDomain;
    public readonly code: MeshCoreErrorCode;
    /** Bound that elapsed, for `RESPONSE_TIMEOUT`. */
    public readonly timeoutMs?: number;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        code: MeshCoreErrorCode;
        domain?: MeshCoreErrorDomain;
        timeoutMs?: number;
        details?: Record<string, unknown>;
        cause?: unknown;
    }) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'MeshCoreError';
        this.code = params.code;
        this.domain = params.domain ?? DOMAIN_BY_CODE[params.code];
        this.timeoutMs = params.timeoutMs;
        this.details = params.details;
    }
}

export const isMeshCoreError = (err: unknown, code?: MeshCoreErrorCode): err is MeshCoreError =>
    err instanceof MeshCoreError && (code === undefined || err.code === code);

export const timeoutError = (timeoutMs: number, details?: Record<string, unknown>): MeshCoreError =>
    new MeshCoreError({
        message: `MeshCore response timed out after ${timeoutMs}ms`,
        code: 'RESPONSE_TIMEOUT',
        timeoutMs,
        details,
    });

export const channelClosedError = (): MeshCoreError =>
    new MeshCoreError({
        message: 'MeshCore event subscription closed',
        code: 'CHANNEL_CLOSED',
    });

export const notConnectedError = (): MeshCoreError =>
    new MeshCoreError({
        message: 'MeshCore transport is not connected',
        code: 'NOT_CONNECTED',
    });

export const invalidArgument = (message: string, details?: Record<string, unknown>): MeshCoreError =>
    new MeshCoreError({message, code: 'INVALID_ARGUMENT', details});

/**
 * Wrap an arbitrary thrown value into a {@link MeshCoreError} with the given code.
 * Existing MeshCore errors pass through unchanged.
 */
export const wrapMeshCoreError = (
    err: unknown,
    code: MeshCoreErrorCode,
    details?: Record<string, unknown>,
): MeshCoreError => {
    if (err instanceof MeshCoreError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new MeshCoreError({message, code, details, cause: err});
};
