import {createConsoleLogger, MeshCoreClient, PublicKey, SerialTransport, serialConfigFromEnv} from '../src';

type CliOptions = {
    port: string | null;
    baudRate: number;
    debug: boolean;
    to?: string;
    channel?: number;
    text: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {...serialConfigFromEnv(), text: ''};
    for (const arg of argv) {
        if (arg.startsWith('--port=')) {
            options.port = arg.substring('--port='.length);
        } else if (arg.startsWith('--baud=')) {
            const baudRate = Number(arg.substring('--baud='.length));
            if (Number.isInteger(baudRate) && baudRate > 0) options.baudRate = baudRate;
        } else if (arg.startsWith('--to=')) {
            options.to = arg.substring('--to='.length);
        } else if (arg.startsWith('--channel=')) {
            const channel = Number(arg.substring('--channel='.length));
            if (Number.isInteger(channel) && channel >= 0 && channel <= 255) options.channel = channel;
        } else if (arg.startsWith('--text=')) {
            options.text = arg.substring('--text='.length);
        } else if (arg === '--debug') {
            options.debug = true;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));
const port = options.port;
if (!port || !options.text || (options.to === undefined && options.channel === undefined)) {
    console.error('Usage: meshcore-send --port=/dev/ttyUSB0 (--to=<name|key hex> | --channel=<n>) --text=<message>');
    process.exit(1);
}

const client = new MeshCoreClient({
    transport: new SerialTransport({path: port, baudRate: options.baudRate}),
    logger: createConsoleLogger({debug: options.debug, scope: port}),
});

async function resolveDestination(to: string): Promise<PublicKey> {
    await client.fetchContacts();
    const byName = client.findContactByName(to);
    if (byName) return byName.publicKey;
    if (/^[0-9a-f]{64}$/i.test(to)) return PublicKey.fromHex(to);
    throw new Error(`Unknown contact "${to}"`);
}

async function main(): Promise<void> {
    await client.connect();
    if (options.channel !== undefined) {
        await client.sendChannelMessage(options.channel, options.text);
        console.log(`Sent to channel ${options.channel}`);
    } else if (options.to !== undefined) {
        const destination = await resolveDestination(options.to);
        const ack = await client.sendMessage(destination, options.text);
        console.log(`Delivered to ${destination.prefixHex()} (ack 0x${ack.toString(16)})`);
    }
    await client.disconnect();
}

main().catch(async (err: unknown) => {
    console.error('[MeshCoreError]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
    await client.disconnect().catch((closeErr: unknown) => {
        console.error('[MeshCoreError]', closeErr instanceof Error ? closeErr.message : closeErr);
    });
});
