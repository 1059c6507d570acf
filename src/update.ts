/**
 * @module
 * Incremental update implementation.
 *
 * Targets are made depth-first: prerequisites in declared order, then the
 * target itself. A file target is remade when it is missing or when a
 * prerequisite is strictly newer. Phony targets are remade whenever reached.
 * Each target is made at most once per update, unless a recipe that removes it
 * runs in between.
 */
import {
    CircularDependencyError,
    MissingOutputError,
    NoRuleError,
    RecipeFailedError,
} from './errors';
import {
    Logger,
} from './logger';
import {
    Progress,
} from './progress';
import {
    RuleSet,
    statFile,
} from './rules';
import {
    RecipeContext,
    Rule,
    RuleKind,
} from './task';
import util = require('util');
import path = require('path');

/**
 * Instant of a made target: an mtime in ms, or `undefined` for a phony target
 * with no dated prerequisite.
 */
type Instant = number | undefined;

class Updater {
    private readonly rules: RuleSet;
    private readonly logger: Logger;
    private readonly progress: Progress;
    /** Targets made during this update, keyed like {@link RuleSet#resolve}. */
    private readonly made: Map<string, Instant>;
    private numUpdated: number;

    constructor(rules: RuleSet, logger: Logger, progress: Progress) {
        this.rules = rules;
        this.logger = logger;
        this.progress = progress;
        this.made = new Map();
        this.numUpdated = 0;
    }

    async update(targets: readonly string[]): Promise<number> {
        for (const target of targets)
            await this.make(target, []);
        return this.numUpdated;
    }

    private async make(name: string, stack: readonly string[]): Promise<Instant> {
        const key = this.rules.resolve(name);
        if (this.made.has(key))
            return this.made.get(key);
        const start = stack.indexOf(key);
        if (start >= 0)
            throw new CircularDependencyError([...stack.slice(start), key]);

        const rule = this.rules.get(name);
        let instant: Instant;
        if (!rule) {
            instant = await statFile(key);
            if (instant === undefined)
                throw new NoRuleError(name, stack.length ? stack[stack.length - 1] : undefined);
        } else {
            instant = await this.makeRule(rule, [...stack, key]);
        }
        this.made.set(key, instant);
        return instant;
    }

    private async makeRule(rule: Rule, stack: readonly string[]): Promise<Instant> {
        const instants: Instant[] = [];
        for (const prerequisite of rule.prerequisites)
            instants.push(await this.make(prerequisite, stack));
        const newest = newestOf(instants);

        if (rule.kind === RuleKind.Phony) {
            await this.runRecipe(rule);
            return newest;
        }

        const mtime = await statFile(rule.target);
        if (mtime !== undefined && (newest === undefined || newest <= mtime)) {
            this.logger.debug(`'${this.displayName(rule.target)}' is up to date`);
            return mtime;
        }
        this.logger.debug(mtime === undefined ?
            `'${this.displayName(rule.target)}' does not exist` :
            `'${this.displayName(rule.target)}' is older than its prerequisites`);

        await this.runRecipe(rule);
        const remade = await statFile(rule.target);
        if (remade === undefined)
            throw new MissingOutputError(rule.target);
        return remade;
    }

    private async runRecipe(rule: Rule): Promise<void> {
        const recipe = rule.recipe;
        if (!recipe)
            return;
        const ctx: RecipeContext = {
            output: [],
            prerequisites: rule.prerequisites.map(x => this.rules.resolve(x)),
            target: rule.target,
        };
        const description = rule.description || this.displayName(rule.target);
        this.numUpdated++;
        this.progress.status = `[${this.numUpdated}] ${description}`;
        this.progress.render();
        try {
            await recipe(ctx);
        } catch (error) {
            this.printOutput(ctx.output);
            this.progress.write(util.inspect(error) + '\n');
            throw new RecipeFailedError(rule.target, error);
        }
        this.printOutput(ctx.output);
        for (const target of rule.invalidates || [])
            this.made.delete(this.rules.resolve(target));
    }

    private printOutput(output: Buffer[]): void {
        for (const chunk of output)
            this.progress.write(chunk);
    }

    private displayName(target: string): string {
        if (!path.isAbsolute(target))
            return target;
        return path.relative(this.rules.baseDir, target) || target;
    }
}

function newestOf(instants: readonly Instant[]): Instant {
    let newest: Instant;
    for (const instant of instants) {
        if (instant !== undefined && (newest === undefined || instant > newest))
            newest = instant;
    }
    return newest;
}

/**
 * Makes `targets` in order. Returns the number of recipes that ran.
 */
export function update(rules: RuleSet, targets: readonly string[], logger: Logger, progress: Progress): Promise<number> {
    const updater = new Updater(rules, logger, progress);
    return updater.update(targets);
}
