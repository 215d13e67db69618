#!/usr/bin/env node

import { ApiServer } from './api/ApiServer.js';
import { loadConfig } from './config/EngineConfig.js';
import { MiningEngine } from './engine/MiningEngine.js';
import { describeError, isMiningError } from './errors/MiningError.js';
import { HalvingSchedule } from './token/HalvingSchedule.js';
import { formatUnits, RATE_DECIMALS } from './utils/fixedPoint.js';
import { createLogger } from './utils/logger.js';

const USAGE = `
hashrig - mining economy engine

Usage:
  hashrig start [--config config.json]                  Start the engine + API server
  hashrig schedule [--config config.json] [--epochs n]  Print the halving schedule
  hashrig help                                          Show this message
`.trim();

function option(args: string[], name: string): string | undefined {
    const idx = args.indexOf(name);
    return idx !== -1 ? args[idx + 1] : undefined;
}

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];

    if (!command || command === 'help' || command === '--help') {
        console.log(USAGE);
        return;
    }

    if (command === 'start') {
        const config = loadConfig(option(args, '--config'));
        const engine = await MiningEngine.create(config);
        const api = new ApiServer(engine, createLogger(config.logLevel, 'api'));
        await api.start(config.apiPort);

        console.log(`\n⛏️  hashrig engine started`);
        console.log(`   Token:   ${config.tokenSymbol} (${config.tokenDecimals} decimals)`);
        console.log(`   API:     http://localhost:${config.apiPort}`);
        console.log(`   Records: ${config.dataFile ?? 'in memory'}`);

        const shutdown = async (): Promise<void> => {
            console.log('\n⏹️  Shutting down...');
            await api.stop();
            await engine.shutdown();
        };
        const onSignal = (): void => {
            shutdown().then(
                () => process.exit(0),
                (error: unknown) => {
                    console.error('Shutdown failed:', describeError(error));
                    process.exit(1);
                },
            );
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);
        return;
    }

    if (command === 'schedule') {
        const config = loadConfig(option(args, '--config'));
        const epochs = Number(option(args, '--epochs') ?? '8');
        if (!Number.isSafeInteger(epochs) || epochs <= 0) {
            throw new Error('--epochs must be a positive integer');
        }
        const schedule = new HalvingSchedule(config.schedule);
        console.log(`\n📉 Halving schedule (${config.tokenSymbol} base units per hash power per second)`);
        for (const info of schedule.describe(epochs)) {
            const startsAt = new Date(info.startsAt * 1000).toISOString();
            console.log(`   epoch ${String(info.epoch).padStart(3)}  from ${startsAt}  rate ${formatUnits(info.rate, RATE_DECIMALS)}`);
        }
        console.log(`   rate reaches zero at epoch ${schedule.zeroEpoch}`);
        return;
    }

    console.error(`Unknown command "${command}"\n\n${USAGE}`);
    process.exitCode = 1;
}

main().catch((err: unknown) => {
    console.error('Fatal error:', isMiningError(err) ? `${err.code}: ${err.message}` : describeError(err));
    process.exit(1);
});
