/**
 * USB serial transport built on the `serialport` package.
 * @module transport/serial
 */
import {SerialPort} from 'serialport';

import {MESHCORE_DEFAULT_BAUD_RATE} from '../protocols/meshcore/constants';
import {notConnectedError, wrapMeshCoreError} from '../protocols/meshcore/errors';
import {ChunkQueue, type Transport} from './types';

export type SerialTransportOptions = {
    /** Device path, e.g. `/dev/ttyUSB0` or `COM3`. */
    path: string;
    /** Line speed. Defaults to {@link MESHCORE_DEFAULT_BAUD_RATE}. */
    baudRate?: number;
};

export type SerialPortDescription = Awaited<ReturnType<typeof SerialPort.list>>[number];

/**
 * List serial ports visible to the host.
 */
export const listSerialPorts = (): Promise<SerialPortDescription[]> => SerialPort.list();

export class SerialTransport implements Transport {
    public readonly path: string;
    public readonly baudRate: number;
    private port: SerialPort | null = null;
    private readonly queue = new ChunkQueue();

    constructor(options: SerialTransportOptions) {
        this.path = options.path;
        this.baudRate = options.baudRate ?? MESHCORE_DEFAULT_BAUD_RATE;
    }

    public async connect(): Promise<void> {
        if (this.port?.isOpen) return;
        this.queue.reset();

        const port = new SerialPort({
            path: this.path,
            baudRate: this.baudRate,
            autoOpen: false,
            dataBits: 8,
            parity: 'none',
            stopBits: 1,
        });

        await new Promise<void>((resolve, reject) => {
            const onOpen = (): void => {
                port.off('error', onError);
                resolve();
            };
            const onError = (err: Error): void => {
                port.off('open', onOpen);
                reject(wrapMeshCoreError(err, 'TRANSPORT_ERROR', {path: this.path}));
            };
            port.once('open', onOpen);
            port.once('error', onError);
            port.open();
        });

        port.on('data', (chunk: Buffer) => {
            this.queue.push(chunk);
        });
        port.on('error', (err: Error) => {
            this.queue.fail(wrapMeshCoreError(err, 'TRANSPORT_ERROR', {path: this.path}));
        });
        port.on('close', (err?: Error | null) => {
            if (this.port === port) this.port = null;
            if (err) {
                this.queue.fail(wrapMeshCoreError(err, 'TRANSPORT_ERROR', {path: this.path}));
            } else {
                this.queue.end();
            }
        });
        this.port = port;
    }

    public async disconnect(): Promise<void> {
        const port = this.port;
        this.port = null;
        if (!port || !port.isOpen) {
            this.queue.end();
            return;
        }
        await new Promise<void>((resolve) => {
            port.close(() => resolve());
        });
        this.queue.end();
    }

    public isConnected(): boolean {
        return this.port?.isOpen ?? false;
    }

    public async send(data: Buffer): Promise<void> {
        const port = this.port;
        if (!port || !port.isOpen) throw notConnectedError();
        await new Promise<void>((resolve, reject) => {
            port.write(data, (err) => {
                if (err) {
                    reject(wrapMeshCoreError(err, 'TRANSPORT_ERROR', {path: this.path}));
                    return;
                }
                port.drain((drainErr) => {
                    if (drainErr) reject(wrapMeshCoreError(drainErr, 'TRANSPORT_ERROR', {path: this.path}));
                    else resolve();
                });
            });
        });
    }

    public read(): Promise<Buffer | null> {
        return this.queue.read();
    }
}
