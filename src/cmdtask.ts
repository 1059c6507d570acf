/**
 * @module
 * Implements recipes that run commands.
 */
import {
    CommandFailedError,
} from './errors';
import {
    Recipe,
} from './task';
import childProcess = require('child_process');

/**
 * Runs external commands on behalf of recipes.
 */
export interface CommandRunner {
    /**
     * Runs `command` to completion, appending its stdout and stderr to `output`.
     * Rejects if the command cannot be started or exits with a non-zero code.
     */
    run(command: readonly string[], output: Buffer[]): Promise<void>;
}

/**
 * Runner that spawns child processes.
 */
export function createSpawnRunner(cwd?: string): CommandRunner {
    return {
        run: (command, output) => runCommand(command, output, cwd),
    };
}

/**
 * Converts a list of commands into a recipe that runs them in sequence.
 */
export function commandRecipe(commands: readonly (readonly string[])[], runner: CommandRunner): Recipe {
    return async ctx => {
        for (const command of commands)
            await runner.run(command, ctx.output);
    };
}

/**
 * Describes commands the way a shell would read them.
 */
export function describeCommands(commands: readonly (readonly string[])[]): string {
    return commands.map(command => command.map(quote).join(' ')).join(' && ');
}

function runCommand(command: readonly string[], output: Buffer[], cwd?: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        const cmdFile = command[0];
        const cmdArgs = command.slice(1);
        const cp = childProcess.spawn(cmdFile, cmdArgs, {
            cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
        });
        cp.on('error', e => {
            reject(e);
        });
        cp.on('close', (code, signal) => {
            if (code === 0)
                return resolve();
            reject(new CommandFailedError(command, code, signal));
        });
        const chunkCallback = (chunk: string | Buffer) => {
            output.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        };
        cp.stdout.on('data', chunkCallback);
        cp.stderr.on('data', chunkCallback);
    });
}

/**
 * Return a shell-escaped version of `x`
 */
export function quote(x: string): string {
    if (!x.length)
        return '\'\'';
    else if (!/[^\w@%+=:,./-]/.test(x))
        return x;

    const y = x.replace(/'/g, `'"'"'`);
    return `'${y}'`;
}
