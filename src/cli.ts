#!/usr/bin/env node
/**
 * @module
 * Command line interface: `stampmake [targets..]`.
 */
import {
    loadBuildFile,
} from './config';
import {
    createConsoleLogger,
    Logger,
} from './logger';
import {
    Progress,
} from './progress';
import yargs from 'yargs';
import {
    hideBin,
} from 'yargs/helpers';
import path = require('path');

/**
 * Where the command line writes. Default: the console.
 */
export interface CliOutput {
    logger?: Logger;
    progress?: Progress;
}

/**
 * Runs the command line `args`. Returns the process exit code.
 */
export async function run(args: string[], out?: CliOutput): Promise<number> {
    const output = out || {};
    const argv = await yargs(args)
        .scriptName('stampmake')
        .usage('$0 [targets..]\n\nMake targets of a build file.')
        .option('file', {
            alias: 'f',
            default: 'stampfile.json',
            describe: 'Build file',
            type: 'string',
        })
        .option('directory', {
            alias: 'C',
            describe: 'Change to this directory before doing anything',
            type: 'string',
        })
        .option('list', {
            default: false,
            describe: 'List tasks, tools and phony targets, then exit',
            type: 'boolean',
        })
        .option('verbose', {
            alias: 'v',
            default: false,
            describe: 'Explain why each target is made or skipped',
            type: 'boolean',
        })
        .strictOptions()
        .help()
        .parse();

    const log = output.logger || createConsoleLogger(argv.verbose ? 'debug' : 'info');
    const cwd = path.resolve(argv.directory || '.');
    try {
        const { builder, defaultTargets } = await loadBuildFile(path.resolve(cwd, argv.file), {
            baseDir: cwd,
            logger: log,
            progress: output.progress,
        });

        if (argv.list) {
            for (const task of builder.stamps.list())
                log.print(`task ${task.name}`);
            for (const tool of builder.tools.list())
                log.print(`tool ${tool.name} (${tool.source})`);
            for (const name of builder.rules.phonyTargets())
                log.print(`phony ${name}`);
            return 0;
        }

        const targets = argv._.length ? argv._.map(String) : defaultTargets;
        if (!targets.length) {
            log.print('No targets given and no default targets in the build file');
            return 2;
        }
        const numUpdated = await builder.make(targets);
        if (!numUpdated)
            log.print(`Nothing to be done for '${targets.join(' ')}'`);
        return 0;
    } catch (e) {
        log.error('stampmake failed', e);
        return 1;
    }
}

if (require.main === module) {
    run(hideBin(process.argv)).then(code => {
        process.exitCode = code;
    }, e => {
        console.error(e);
        process.exitCode = 1;
    });
}
