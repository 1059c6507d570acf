/**
 * @module
 * Tools installed on first use into an isolated environment.
 */
import {
    CommandRunner,
    describeCommands,
} from './cmdtask';
import {
    InvalidToolNameError,
    UnknownToolError,
} from './errors';
import {
    isValidName,
    RuleSet,
} from './rules';
import {
    StampStore,
} from './stamp';
import path = require('path');
import fs = require('fs-extra');

/**
 * Environment configuration.
 */
export interface EnvironmentOptions {
    /** Environment root. Default: `env`. */
    dir?: string;
    /**
     * File written when the environment is created, relative to `dir`.
     * Tools are not installed before it exists.
     * Default: `pyvenv.cfg`.
     */
    descriptor?: string;
    /** Directory of tool commands, relative to `dir`. Default: `bin`. */
    binDir?: string;
    /** Command creating the environment. Default: `python3 -m venv <dir>`. */
    provision?: string[];
    /** Files the environment is created from. */
    provisionInputs?: string[];
    /** Command prefix installing a package. Default: `<dir>/<binDir>/pip install`. */
    installer?: string[];
    /** Options passed to the installer before the package name. */
    installOptions?: string[];
    /**
     * Tasks whose results live in the environment. `env-clean` removes their
     * stamps so that they run again in a new environment.
     */
    stampTasks?: string[];
}

/**
 * Options for {@link ToolRegistry#define}.
 */
export interface ToolOptions {
    /** Package providing the tool. Default: the tool name. */
    source?: string;
    /** Targets to make before installing. Default: the environment descriptor. */
    requires?: string[];
}

export interface Tool {
    readonly name: string;
    readonly source: string;
    readonly commandPath: string;
    readonly installTarget: string;
}

/** Name of the target creating the environment. */
export const ENV_TARGET = 'env';
/** Name of the target removing the stamps of environment tasks. */
export const ENV_CLEAN_TARGET = 'env-clean';
/** Name of the target removing the environment. */
export const ENV_REALCLEAN_TARGET = 'env-realclean';

/**
 * Registry of tools available in the environment.
 */
export class ToolRegistry {
    readonly dir: string;
    readonly descriptor: string;
    readonly binDir: string;
    private readonly installer: string[];
    private readonly installOptions: string[];
    private readonly rules: RuleSet;
    private readonly runner: CommandRunner;
    private readonly tools: Map<string, Tool>;
    /** Files under `dir` that rules make. */
    private readonly envFiles: string[];

    constructor(rules: RuleSet, runner: CommandRunner, store: StampStore, options?: EnvironmentOptions) {
        const opts = options || {};
        this.rules = rules;
        this.runner = runner;
        this.tools = new Map();
        this.dir = path.resolve(rules.baseDir, opts.dir || 'env');
        this.descriptor = path.join(this.dir, opts.descriptor || 'pyvenv.cfg');
        this.binDir = path.join(this.dir, opts.binDir || 'bin');
        this.installer = opts.installer || [path.join(this.binDir, 'pip'), 'install'];
        this.installOptions = opts.installOptions || [];
        this.envFiles = [this.descriptor];

        const provision = opts.provision || ['python3', '-m', 'venv', this.dir];
        const descriptor = this.descriptor;
        // An existing environment is never created again, even when older than its inputs.
        rules.addFileRule(descriptor, opts.provisionInputs || [], async ctx => {
            if (!(await fs.pathExists(descriptor)))
                await runner.run(provision, ctx.output);
        }, `create environment: ${describeCommands([provision])}`);
        rules.addPhonyRule(ENV_TARGET, [descriptor]);
        const envStamps = (opts.stampTasks || []).map(x => store.stampFile(x));
        rules.addPhonyRule(ENV_CLEAN_TARGET, [], async () => {
            for (const stampFile of envStamps)
                await fs.remove(stampFile);
        }, 'remove environment stamps', envStamps);
        rules.addPhonyRule(ENV_REALCLEAN_TARGET, [ENV_CLEAN_TARGET], () => fs.remove(this.dir), 'remove environment', this.envFiles);
    }

    /**
     * Declares every tool in `names`. A name already declared is skipped.
     */
    declare(names: Iterable<string>): Tool[] {
        return [...names].map(name => this.define(name));
    }

    /**
     * Declares tool `name` and defines its install targets. Declaring a tool
     * again returns the existing tool.
     */
    define(name: string, options?: ToolOptions): Tool {
        const existing = this.tools.get(name);
        if (existing)
            return existing;
        if (!isValidName(name))
            throw new InvalidToolNameError(name);

        const opts = options || {};
        const tool: Tool = {
            commandPath: path.join(this.binDir, name),
            installTarget: `${name}-install`,
            name,
            source: opts.source || name,
        };
        const command = [...this.installer, ...this.installOptions, tool.source];
        const runner = this.runner;
        this.rules.addFileRule(tool.commandPath, opts.requires || [this.descriptor], async ctx => {
            if (!(await fs.pathExists(tool.commandPath)))
                await runner.run(command, ctx.output);
        }, `install ${tool.source}`);
        this.rules.addPhonyRule(tool.installTarget, [tool.commandPath]);
        this.tools.set(name, tool);
        this.envFiles.push(tool.commandPath);
        return tool;
    }

    /**
     * Returns the command path of declared tool `name`.
     */
    commandPath(name: string): string {
        return this.get(name).commandPath;
    }

    get(name: string): Tool {
        const tool = this.tools.get(name);
        if (!tool)
            throw new UnknownToolError(name);
        return tool;
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    list(): Tool[] {
        return [...this.tools.values()];
    }
}
