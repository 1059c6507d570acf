/**
 * Context that will be passed to a recipe during execution.
 */
export interface RecipeContext {
    /** Target being made: a file path for file rules, a name for phony rules. */
    readonly target: string;
    /** Resolved prerequisites of the target, in declared order. */
    readonly prerequisites: readonly string[];
    /** Recipe output */
    readonly output: Buffer[];
}

/**
 * Function that makes a target.
 */
export type Recipe = (ctx: RecipeContext) => (Promise<void> | void);

/**
 * Rule kinds.
 */
export enum RuleKind {
    File,
    Phony,
}

interface RuleBase {
    /** Rule target. */
    target: string;
    /** Prerequisite names or paths, as declared. */
    prerequisites: string[];
    /** Recipe. A rule without one only orders its prerequisites. */
    recipe?: Recipe;
    /** Rule description. Default: the target. */
    description?: string;
    /**
     * Targets the recipe removes. Once it has run, they are made again when
     * reached later in the same update.
     */
    invalidates?: readonly string[];
}

/**
 * Rule for a file, made only when stale.
 */
export interface FileRule extends RuleBase {
    kind: RuleKind.File;
}

/**
 * Rule for a name with no file behind it, made every time it is reached.
 */
export interface PhonyRule extends RuleBase {
    kind: RuleKind.Phony;
}

export type Rule = FileRule | PhonyRule;
