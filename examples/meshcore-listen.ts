import {createConsoleLogger, MeshCoreClient, type ReceivedMessage, SerialTransport, serialConfigFromEnv} from '../src';

function parseArgs(argv: string[]): {port: string | null; baudRate: number; debug: boolean} {
    const options = serialConfigFromEnv();
    for (const arg of argv) {
        if (arg.startsWith('--port=')) {
            options.port = arg.substring('--port='.length);
        } else if (arg.startsWith('--baud=')) {
            const baudRate = Number(arg.substring('--baud='.length));
            if (Number.isInteger(baudRate) && baudRate > 0) options.baudRate = baudRate;
        } else if (arg === '--debug') {
            options.debug = true;
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));
const port = options.port;
if (!port) {
    console.error('Usage: meshcore-listen --port=/dev/ttyUSB0 [--baud=115200] [--debug]  (or set MESHCORE_PORT)');
    process.exit(1);
}

const client = new MeshCoreClient({
    transport: new SerialTransport({path: port, baudRate: options.baudRate}),
    logger: createConsoleLogger({debug: options.debug, scope: port}),
});

const printMessage = (received: ReceivedMessage): void => {
    const time = new Date(received.message.timestamp * 1000).toISOString();
    if (received.type === 'channelMessage') {
        console.log(`[${time}] #${received.message.channelIndex}: ${received.message.text}`);
        return;
    }
    const sender = client.findContactByPrefix(received.message.senderPrefix);
    console.log(`[${time}] ${sender?.name ?? received.message.senderPrefix.toString('hex')}: ${received.message.text}`);
};

let draining: Promise<void> | null = null;

const drainInbox = (): void => {
    if (draining) return;
    draining = client.fetchMessages()
        .then((messages) => messages.forEach(printMessage))
        .catch((err: unknown) => {
            console.error('[MeshCoreError]', err instanceof Error ? err.message : err);
        })
        .finally(() => {
            draining = null;
        });
};

client.on('event', (event) => {
    switch (event.type) {
        case 'messagesWaiting':
            drainInbox();
            break;
        case 'advertisement':
            console.log(`Advert from ${event.publicKey.prefixHex()}`);
            break;
        case 'newContactAdvert':
            console.log(`New contact ${event.contact.name} ${event.contact.publicKey.prefixHex()}`);
            break;
        case 'ack':
            console.log(`Ack 0x${event.code.toString(16)}`);
            break;
        case 'logData':
            console.log(`Radio log: ${event.text}`);
            break;
        default:
            break;
    }
});

client.on('disconnect', (hadError) => {
    console.log(`Disconnected (hadError=${hadError})`);
});

client.on('error', (error) => {
    console.error('[MeshCoreError]', error.code, error.message);
});

async function main(): Promise<void> {
    const self = await client.connect();
    console.log(`Listening as "${self.name}" on ${port}`);
    await client.fetchContacts();
    drainInbox();
}

main().catch((err: unknown) => {
    console.error('[MeshCoreError]', err instanceof Error ? err.message : err);
    process.exitCode = 1;
});

function shutdown(): void {
    client.disconnect()
        .catch((err: unknown) => {
            console.error('[MeshCoreError]', err instanceof Error ? err.message : err);
        })
        .finally(() => process.exit(0));
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
