/**
 * @module
 * Builder: rules, stamp tasks and tools of one build.
 */
import {
    CommandRunner,
    createSpawnRunner,
} from './cmdtask';
import {
    EnvironmentOptions,
    ToolRegistry,
} from './envtools';
import {
    createNopLogger,
    Logger,
} from './logger';
import {
    createProgress,
    Progress,
} from './progress';
import {
    RuleSet,
} from './rules';
import {
    StampStore,
} from './stamp';
import {
    StampTasks,
} from './stamptask';
import {
    update,
} from './update';
import path = require('path');

/**
 * Options for {@link newBuilder}
 */
export interface BuilderOptions {
    /**
     * Directory that relative paths are resolved against.
     * Default: the current working directory.
     */
    baseDir?: string;

    /**
     * Directory of stamp files, relative to `baseDir`.
     * Default: `.mkdone`.
     */
    stampDir?: string;

    /** Environment that tools are installed into. */
    env?: EnvironmentOptions;

    /** Runs installer and provisioning commands. Default: spawns child processes in `baseDir`. */
    runner?: CommandRunner;

    /** Default: a logger that discards everything. */
    logger?: Logger;

    /** Default: status on stdout. */
    progress?: Progress;

    /** Clock used to date stamps. Default: the wall clock. */
    now?: () => Date;
}

/**
 * Represents a build to be done.
 */
export interface Builder {
    readonly rules: RuleSet;
    readonly stamps: StampTasks;
    readonly tools: ToolRegistry;
    readonly runner: CommandRunner;
    /**
     * Make `targets`, in order. Returns the number of recipes that ran.
     * No task can be declared once the first make has started.
     */
    make(targets: readonly string[]): Promise<number>;
}

class BuilderImpl implements Builder {
    readonly rules: RuleSet;
    readonly stamps: StampTasks;
    readonly tools: ToolRegistry;
    readonly runner: CommandRunner;
    private readonly logger: Logger;
    private readonly progress: Progress;

    constructor(options: BuilderOptions) {
        this.rules = new RuleSet(options.baseDir);
        const baseDir = this.rules.baseDir;
        this.runner = options.runner || createSpawnRunner(baseDir);
        this.logger = options.logger || createNopLogger();
        this.progress = options.progress || createProgress();
        const store = new StampStore(path.resolve(baseDir, options.stampDir || '.mkdone'), { now: options.now });
        this.stamps = new StampTasks(this.rules, store);
        this.tools = new ToolRegistry(this.rules, this.runner, store, options.env);
    }

    async make(targets: readonly string[]): Promise<number> {
        this.stamps.seal();
        this.logger.debug(`making ${targets.join(' ')}`);
        try {
            return await update(this.rules, targets, this.logger, this.progress);
        } finally {
            this.progress.unrender();
        }
    }
}

/**
 * Construct a new build context.
 */
export function newBuilder(options?: BuilderOptions): Builder {
    return new BuilderImpl(options || {});
}
