import {createConsoleLogger, MeshCoreClient, SerialTransport, serialConfigFromEnv} from '../src';

type CliOptions = {
    port: string | null;
    baudRate: number;
    debug: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = serialConfigFromEnv();
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
    console.error('Usage: meshcore-info --port=/dev/ttyUSB0 [--baud=115200] [--debug]  (or set MESHCORE_PORT)');
    process.exit(1);
}

const client = new MeshCoreClient({
    transport: new SerialTransport({path: port, baudRate: options.baudRate}),
    logger: createConsoleLogger({debug: options.debug, scope: port}),
});

async function main(): Promise<void> {
    const self = await client.connect();
    console.log(`Node "${self.name}" key=${self.publicKey.toHex()}`);
    console.log(`Radio ${self.radio.frequencyMhz} MHz bw=${self.radio.bandwidthKhz} kHz sf=${self.radio.spreadingFactor} cr=${self.radio.codingRate} tx=${self.txPower}/${self.maxTxPower} dBm`);
    if (self.latitude !== null && self.longitude !== null) {
        console.log(`Position ${self.latitude.toFixed(6)}, ${self.longitude.toFixed(6)}`);
    }

    const info = await client.getDeviceInfo();
    console.log(`Firmware v${info.firmwareVersion}${info.firmwareBuild ? ` (${info.firmwareBuild})` : ''}${info.model ? ` on ${info.model}` : ''}`);

    const battery = await client.getBattery();
    const storage = battery.usedKb !== null && battery.totalKb !== null ? ` storage=${battery.usedKb}/${battery.totalKb} kB` : '';
    console.log(`Battery ${battery.millivolts} mV${storage}`);

    const contacts = await client.fetchContacts();
    console.log(`${contacts.size} contacts`);
    for (const contact of contacts.values()) {
        const route = contact.pathLength < 0 ? 'flood' : `${contact.pathLength} hops`;
        console.log(`  ${contact.publicKey.prefixHex()} ${contact.name} (${route})`);
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
