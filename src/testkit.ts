/**
 * @module
 * Test helpers: temporary directories, a fake clock and a fake command runner.
 */
import {
    CommandRunner,
} from './cmdtask';
import {
    CommandFailedError,
} from './errors';
import {
    Logger,
} from './logger';
import {
    createProgress,
    Progress,
} from './progress';
import stream = require('stream');
import path = require('path');
import os = require('os');
import fs = require('fs-extra');

/** 2020-01-01T00:00:00Z */
export const T0 = Date.UTC(2020, 0, 1);

/**
 * Clock that moves ten seconds forward on every reading.
 */
export class FakeClock {
    private time: number;

    constructor(start: number = T0) {
        this.time = start;
    }

    readonly now = (): Date => {
        this.time += 10000;
        return new Date(this.time);
    };

    /** Last time read, in ms. */
    current(): number {
        return this.time;
    }
}

/**
 * Command runner that records commands instead of running them.
 */
export class FakeRunner implements CommandRunner {
    readonly commands: string[][];
    private readonly effects: Map<string, (command: readonly string[]) => Promise<void>>;
    private readonly failures: Set<string>;

    constructor() {
        this.commands = [];
        this.effects = new Map();
        this.failures = new Set();
    }

    /** Runs `effect` whenever a command starting with `program` runs. */
    on(program: string, effect: (command: readonly string[]) => Promise<void>): this {
        this.effects.set(program, effect);
        return this;
    }

    /** Makes every command starting with `program` exit with code 1. */
    fail(program: string): this {
        this.failures.add(program);
        return this;
    }

    async run(command: readonly string[], output: Buffer[]): Promise<void> {
        this.commands.push([...command]);
        output.push(Buffer.from(`${command.join(' ')}\n`));
        if (this.failures.has(command[0]))
            throw new CommandFailedError(command, 1, null);
        const effect = this.effects.get(command[0]);
        if (effect)
            await effect(command);
    }

    /** Returns the commands that ran, joined by spaces. */
    lines(): string[] {
        return this.commands.map(x => x.join(' '));
    }
}

/**
 * Logger that keeps what is printed.
 */
export class CaptureLogger implements Logger {
    readonly printed: string[] = [];
    readonly errors: unknown[] = [];

    print(message: string): void {
        this.printed.push(message);
    }

    info(_message: string, ..._rest: unknown[]): void {
        // noop
    }

    debug(_message: string, ..._rest: unknown[]): void {
        // noop
    }

    error(_message: string, err: unknown, ..._rest: unknown[]): void {
        this.errors.push(err);
    }
}

/**
 * Progress that writes nowhere.
 */
export function createSilentProgress(): Progress {
    return createProgress(new stream.Writable({
        write(_chunk, _encoding, callback) {
            callback();
        },
    }));
}

export function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'stampmake-'));
}

/**
 * Writes `filename` and sets its mtime to `mtime` ms.
 */
export async function writeFile(filename: string, mtime: number, contents: string = ''): Promise<void> {
    await fs.outputFile(filename, contents);
    await setMtime(filename, mtime);
}

export async function setMtime(filename: string, mtime: number): Promise<void> {
    const date = new Date(mtime);
    await fs.utimes(filename, date, date);
}
