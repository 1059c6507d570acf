/**
 * @module
 * Completion markers ("stamps") for tasks.
 */
import {
    statFile,
} from './rules';
import path = require('path');
import fs = require('fs-extra');

/**
 * Options for {@link StampStore}.
 */
export interface StampStoreOptions {
    /**
     * Clock used to date new stamps.
     * Default: the wall clock.
     */
    now?: () => Date;
}

/**
 * Maps task names to stamp files under a single directory.
 *
 * A stamp's existence and mtime are the only record that a task completed.
 */
export class StampStore {
    readonly dir: string;
    private readonly now: () => Date;

    constructor(dir: string, options?: StampStoreOptions) {
        this.dir = path.resolve(dir);
        this.now = (options && options.now) || (() => new Date());
    }

    /**
     * Returns the stamp file of task `name`.
     */
    stampFile(name: string): string {
        return path.join(this.dir, `.${name}_done`);
    }

    async exists(name: string): Promise<boolean> {
        return (await this.mtime(name)) !== undefined;
    }

    /**
     * Returns the stamp's mtime in ms, or `undefined` if there is no stamp.
     */
    async mtime(name: string): Promise<number | undefined> {
        return statFile(this.stampFile(name));
    }

    /**
     * Creates the stamp and dates it now. Must be the last step of a
     * successful run.
     */
    async touch(name: string): Promise<void> {
        const file = this.stampFile(name);
        await fs.ensureFile(file);
        const now = this.now();
        await fs.utimes(file, now, now);
    }

    /**
     * Removes the stamp. Does nothing if there is none.
     */
    async remove(name: string): Promise<void> {
        await fs.remove(this.stampFile(name));
    }
}
