import {
    DuplicateRuleError,
} from './errors';
import {
    FileRule,
    PhonyRule,
    Recipe,
    Rule,
    RuleKind,
} from './task';
import path = require('path');
import fs = require('fs-extra');

/**
 * Rules of a build, keyed by target.
 *
 * File targets are keyed by absolute path, phony targets by name. When a
 * prerequisite names a phony target it refers to that target, otherwise it is a
 * path relative to `baseDir`.
 */
export class RuleSet {
    readonly baseDir: string;
    private readonly fileRules: Map<string, FileRule>;
    private readonly phonyRules: Map<string, PhonyRule>;

    constructor(baseDir: string = process.cwd()) {
        this.baseDir = path.resolve(baseDir);
        this.fileRules = new Map();
        this.phonyRules = new Map();
    }

    addFileRule(target: string, prerequisites: string[], recipe?: Recipe, description?: string): FileRule {
        const key = path.resolve(this.baseDir, target);
        if (this.fileRules.has(key))
            throw new DuplicateRuleError(target);
        const rule: FileRule = {
            description,
            kind: RuleKind.File,
            prerequisites,
            recipe,
            target: key,
        };
        this.fileRules.set(key, rule);
        return rule;
    }

    addPhonyRule(target: string, prerequisites: string[], recipe?: Recipe, description?: string, invalidates?: readonly string[]): PhonyRule {
        if (this.phonyRules.has(target))
            throw new DuplicateRuleError(target);
        const rule: PhonyRule = {
            description,
            invalidates,
            kind: RuleKind.Phony,
            prerequisites,
            recipe,
            target,
        };
        this.phonyRules.set(target, rule);
        return rule;
    }

    /**
     * Returns the key `name` refers to: the phony target name, or the absolute path.
     */
    resolve(name: string): string {
        return this.phonyRules.has(name) ? name : path.resolve(this.baseDir, name);
    }

    has(name: string): boolean {
        return this.get(name) !== undefined;
    }

    get(name: string): Rule | undefined {
        return this.phonyRules.get(name) || this.fileRules.get(path.resolve(this.baseDir, name));
    }

    isPhony(name: string): boolean {
        return this.phonyRules.has(name);
    }

    /**
     * Returns the names of all phony targets, in definition order.
     */
    phonyTargets(): string[] {
        return [...this.phonyRules.keys()];
    }

    /**
     * Returns the paths of all file targets, in definition order.
     */
    fileTargets(): string[] {
        return [...this.fileRules.keys()];
    }
}

/**
 * Returns the mtime of the file in ms, or `undefined` if the file does not exist.
 */
export async function statFile(filename: string): Promise<number | undefined> {
    let stats;
    try {
        stats = await fs.stat(filename);
    } catch (e) {
        if (isMissingFileError(e))
            return undefined;
        throw e;
    }
    return stats.mtime.getTime();
}

/**
 * Returns true if `name` can name a task or a tool: not blank, and free of path
 * separators.
 */
export function isValidName(name: string): boolean {
    return name.trim().length > 0 && !name.includes('/') && !name.includes(path.sep);
}

function isMissingFileError(e: unknown): boolean {
    if (!(e instanceof Error) || !('code' in e))
        return false;
    return e.code === 'ENOENT' || e.code === 'ENOTDIR';
}
