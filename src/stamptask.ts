/**
 * @module
 * Stamp tasks: named units of work memoized by a stamp file.
 *
 * Declaring task `T` defines three targets:
 *
 * - the stamp file of `T`, which is stale when missing or older than one of its
 *   prerequisites. Other tasks list it (see {@link StampTasks#stampOf}) to need
 *   `T`'s result without forcing `T` to run again.
 * - phony `T-clean`, which removes the stamp.
 * - phony `T`, which runs `T-clean` and then makes the stamp, so that it always
 *   runs the work.
 *
 * The work itself is attached with {@link StampTasks#implement}.
 */
import {
    DuplicateRuleError,
    InvalidTaskNameError,
    RegistrationClosedError,
    UnknownTaskError,
} from './errors';
import {
    isValidName,
    RuleSet,
} from './rules';
import {
    StampStore,
} from './stamp';
import {
    Recipe,
    RecipeContext,
} from './task';
import fs = require('fs-extra');

/**
 * Replacement for a task's default clean recipe. It must remove
 * `task.stampFile` itself.
 */
export type CleanRecipe = (task: StampTask, ctx: RecipeContext) => (Promise<void> | void);

/**
 * Options for {@link StampTasks#define}.
 */
export interface StampTaskOptions {
    /** Custom clean recipe. Default: remove the stamp. */
    clean?: CleanRecipe;
    /** Name of the clean target. Default: `<name>-clean`. */
    cleanTarget?: string;
}

/**
 * Declared task.
 */
export interface StampTask {
    readonly name: string;
    readonly stampFile: string;
    readonly cleanTarget: string;
    readonly clean: Recipe;
    readonly cleanOverridden: boolean;
}

/**
 * Work of a declared task.
 */
export interface StampWork {
    /** Files the work reads. */
    inputs?: string[];
    /** Tasks whose results the work needs. */
    needs?: string[];
    /** Tools the work runs. Each adds `<tool>-install` as a prerequisite. */
    tools?: string[];
    /** The work. The stamp is written only after it resolves. */
    fn: Recipe;
    description?: string;
}

/** Name of the target removing every stamp. */
export const CLEAN_STAMPS_TARGET = 'clean-stamps';

/**
 * Registry of stamp tasks.
 */
export class StampTasks {
    readonly store: StampStore;
    private readonly rules: RuleSet;
    private readonly tasks: Map<string, StampTask>;
    /** Stamp of every declared task, in declaration order. */
    private readonly allStamps: string[];
    private sealed: boolean;

    constructor(rules: RuleSet, store: StampStore) {
        this.rules = rules;
        this.store = store;
        this.tasks = new Map();
        this.allStamps = [];
        this.sealed = false;
        rules.addPhonyRule(CLEAN_STAMPS_TARGET, [], async () => {
            for (const stampFile of this.allStamps)
                await fs.remove(stampFile);
        }, 'remove all stamps', this.allStamps);
    }

    /**
     * Declares every task in `names`. A name already declared is skipped.
     */
    declare(names: Iterable<string>, cleanOverrides?: Record<string, CleanRecipe>): StampTask[] {
        const declared: StampTask[] = [];
        for (const name of names) {
            const clean = cleanOverrides && cleanOverrides[name];
            declared.push(this.define(name, clean ? { clean } : undefined));
        }
        return declared;
    }

    /**
     * Declares task `name` and defines its targets. Declaring a task again
     * returns the existing task and leaves its targets untouched.
     */
    define(name: string, options?: StampTaskOptions): StampTask {
        const existing = this.tasks.get(name);
        if (existing)
            return existing;
        if (this.sealed)
            throw new RegistrationClosedError(name);
        if (!isValidName(name))
            throw new InvalidTaskNameError(name);

        const opts = options || {};
        const stampFile = this.store.stampFile(name);
        const cleanTarget = opts.cleanTarget || `${name}-clean`;
        const custom = opts.clean;
        // A rejected name leaves no rule behind.
        if (cleanTarget === name || this.rules.isPhony(cleanTarget))
            throw new DuplicateRuleError(cleanTarget);
        if (this.rules.isPhony(name))
            throw new DuplicateRuleError(name);
        const task: StampTask = {
            clean: custom ? ctx => custom(task, ctx) : () => this.store.remove(name),
            cleanOverridden: custom !== undefined,
            cleanTarget,
            name,
            stampFile,
        };

        this.rules.addPhonyRule(cleanTarget, [], task.clean, `${name}: clean`, [stampFile]);
        this.rules.addPhonyRule(name, [cleanTarget, stampFile], undefined, name);
        this.tasks.set(name, task);
        this.allStamps.push(stampFile);
        return task;
    }

    /**
     * Attaches the work to declared task `name`.
     */
    implement(name: string, work: StampWork): void {
        const task = this.get(name);
        const prerequisites = [
            ...(work.inputs || []),
            ...(work.needs || []).map(x => this.stampOf(x)),
            ...(work.tools || []).map(x => `${x}-install`),
        ];
        const store = this.store;
        this.rules.addFileRule(task.stampFile, prerequisites, async ctx => {
            await work.fn(ctx);
            await store.touch(name);
        }, work.description || name);
    }

    /**
     * Returns the stamp file of declared task `name`.
     */
    stampOf(name: string): string {
        return this.get(name).stampFile;
    }

    get(name: string): StampTask {
        const task = this.tasks.get(name);
        if (!task)
            throw new UnknownTaskError(name);
        return task;
    }

    has(name: string): boolean {
        return this.tasks.has(name);
    }

    /**
     * Returns all declared tasks, in declaration order.
     */
    list(): StampTask[] {
        return [...this.tasks.values()];
    }

    /**
     * Returns the stamp files removed by {@link CLEAN_STAMPS_TARGET}.
     */
    stamps(): readonly string[] {
        return this.allStamps;
    }

    /**
     * Closes registration. Called when the first build starts.
     */
    seal(): void {
        this.sealed = true;
    }
}
