#!/usr/bin/env node
import { parseArgs } from 'util';
import { GatewayError, InputError } from '@seedferry/sdk';
import { loadConfig } from './config';
import { App, createApp } from './app';
import { ConfigError } from './errors/config.error';
import { DuplicateSourceError, TaskNotFoundError } from './errors/store.error';
import { LeaseUnavailableError } from './errors/lease.error';
import { formatTask } from './utils/format';

const TAG = '[seedferry]';

const USAGE = `usage: seedferry <command> [options]

commands:
  add <source>       track a magnet URI, torrent URL or .torrent file
  list               show every task
  show <id>          show one task
  remove <id>        stop tracking a task (--purge also deletes downloaded files)
  start              run the polling loop
                       --interval <s>      seconds between ticks (default CHECK_INTERVAL)
                       --max-runtime <s>   exit after this many seconds
                       --exit-when-idle    exit once no task is left to advance
                       --once              run a single tick
  auth               sign in to OneDrive with a device code`;

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function seconds(value: string | undefined, fallback: number, option: string): number {
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new UsageError(`--${option} expects a number of seconds, got "${value}"`);
    }
    return parsed;
}

function argument(positionals: string[], name: string): string {
    const value = positionals[1];
    if (!value) throw new UsageError(`missing <${name}>`);
    return value;
}

async function run(argv: string[], shutdown: AbortSignal): Promise<void> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            purge: { type: 'boolean', default: false },
            interval: { type: 'string' },
            'max-runtime': { type: 'string' },
            'exit-when-idle': { type: 'boolean', default: false },
            once: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });

    const command = positionals[0];
    if (!command || values.help) {
        console.log(USAGE);
        return;
    }

    const config = loadConfig();
    let app: App | null = null;
    try {
        switch (command) {
            case 'add': {
                const source = argument(positionals, 'source');
                app = await createApp(config);
                const task = await app.control.add(source);
                console.log(task.id);
                break;
            }
            case 'list': {
                app = await createApp(config);
                const tasks = await app.control.list();
                console.log(tasks.length ? tasks.map(formatTask).join('\n\n') : 'no tasks');
                break;
            }
            case 'show': {
                const id = argument(positionals, 'id');
                app = await createApp(config);
                console.log(formatTask(await app.control.show(id)));
                break;
            }
            case 'remove': {
                const id = argument(positionals, 'id');
                app = await createApp(config);
                const task = await app.control.remove(id, values.purge);
                console.log(`${task.id} ${task.state}`);
                break;
            }
            case 'auth': {
                app = await createApp(config, { interactive: true });
                const credential = await app.control.authenticate();
                console.log(`signed in as ${credential.account}; token cache at ${config.onedrive.tokenPath}`);
                break;
            }
            case 'start': {
                const intervalMs = seconds(values.interval, config.checkInterval, 'interval') * 1000;
                const maxRuntimeMs = seconds(values['max-runtime'], config.maxRuntime, 'max-runtime') * 1000;
                app = await createApp(config, { withLease: true });
                console.log(`${TAG} driving ${app.store.location}`);
                await app.control.start({
                    intervalMs,
                    maxRuntimeMs: maxRuntimeMs > 0 ? maxRuntimeMs : undefined,
                    exitWhenIdle: values['exit-when-idle'],
                    once: values.once,
                    signal: shutdown,
                });
                break;
            }
            default:
                throw new UsageError(`unknown command "${command}"`);
        }
    } finally {
        if (app) await app.close();
    }
}

function exitCodeFor(err: unknown): number {
    if (
        err instanceof UsageError
        || err instanceof ConfigError
        || err instanceof InputError
        || err instanceof DuplicateSourceError
        || err instanceof TaskNotFoundError
    ) {
        return 2;
    }
    if (err instanceof LeaseUnavailableError) return 3;
    return 1;
}

const controller = new AbortController();

function onSignal(signal: string) {
    if (controller.signal.aborted) {
        console.warn(`${TAG} ${signal} received again, exiting now`);
        process.exit(130);
    }
    console.log(`${TAG} ${signal} received, finishing the current tick...`);
    controller.abort();
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

run(process.argv.slice(2), controller.signal).catch((err) => {
    const code = exitCodeFor(err);
    if (code === 2 || err instanceof GatewayError || err instanceof LeaseUnavailableError) {
        console.error(`${TAG} ${err.message}`);
        if (err instanceof UsageError) console.error(USAGE);
    } else {
        console.error(`${TAG} fatal:`, err);
    }
    process.exitCode = code;
});
