/**
 * @module
 * Errors raised while declaring or making targets.
 */

/**
 * Base class of every error the build raises.
 */
export class BuildFailedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;

        // Set the prototype explicitly.
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A prerequisite has no rule and does not exist on disk.
 */
export class NoRuleError extends BuildFailedError {
    constructor(readonly target: string, readonly neededBy?: string) {
        super(neededBy ?
            `No rule to make target '${target}', needed by '${neededBy}'` :
            `No rule to make target '${target}'`);
    }
}

export class CircularDependencyError extends BuildFailedError {
    constructor(readonly cycle: readonly string[]) {
        super(`Circular dependency detected: ${cycle.join(' -> ')}`);
    }
}

/**
 * A file rule's recipe completed but the target file is still absent.
 */
export class MissingOutputError extends BuildFailedError {
    constructor(readonly target: string) {
        super(`Recipe for target '${target}' did not produce it`);
    }
}

/**
 * A recipe threw or rejected. The original error is kept in `error`.
 */
export class RecipeFailedError extends BuildFailedError {
    constructor(readonly target: string, readonly error: unknown) {
        super(`Recipe for target '${target}' failed: ${describe(error)}`);
    }
}

export class CommandFailedError extends BuildFailedError {
    constructor(readonly command: readonly string[], readonly code: number | null, readonly signal: string | null) {
        super(`Command returned code ${code}, signal ${signal}: ${command.join(' ')}`);
    }
}

export class DuplicateRuleError extends BuildFailedError {
    constructor(readonly target: string) {
        super(`Target '${target}' already has a rule`);
    }
}

export class UnknownTaskError extends BuildFailedError {
    constructor(readonly taskName: string) {
        super(`Unknown task '${taskName}'`);
    }
}

export class UnknownToolError extends BuildFailedError {
    constructor(readonly toolName: string) {
        super(`Unknown tool '${toolName}'`);
    }
}

export class InvalidTaskNameError extends BuildFailedError {
    constructor(readonly taskName: string) {
        super(`Invalid task name '${taskName}'`);
    }
}

export class InvalidToolNameError extends BuildFailedError {
    constructor(readonly toolName: string) {
        super(`Invalid tool name '${toolName}'`);
    }
}

/**
 * A new task was declared after the first build started.
 */
export class RegistrationClosedError extends BuildFailedError {
    constructor(readonly taskName: string) {
        super(`Cannot declare task '${taskName}': registration is closed`);
    }
}

export class ConfigError extends BuildFailedError {
    constructor(readonly filename: string, readonly issues: readonly string[]) {
        super(`Invalid build file ${filename}:\n${issues.map(x => `  ${x}`).join('\n')}`);
    }
}

function describe(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
