/**
 * @module
 * stampmake Public API
 */
export {
    newBuilder,
} from './builder';
export type {
    Builder,
    BuilderOptions,
} from './builder';
export {
    BuildFailedError,
    CircularDependencyError,
    CommandFailedError,
    ConfigError,
    DuplicateRuleError,
    InvalidTaskNameError,
    InvalidToolNameError,
    MissingOutputError,
    NoRuleError,
    RecipeFailedError,
    RegistrationClosedError,
    UnknownTaskError,
    UnknownToolError,
} from './errors';
export {
    commandRecipe,
    createSpawnRunner,
} from './cmdtask';
export type {
    CommandRunner,
} from './cmdtask';
export {
    ENV_CLEAN_TARGET,
    ENV_REALCLEAN_TARGET,
    ENV_TARGET,
    ToolRegistry,
} from './envtools';
export type {
    EnvironmentOptions,
    Tool,
    ToolOptions,
} from './envtools';
export {
    createConsoleLogger,
    createNopLogger,
} from './logger';
export type {
    Logger,
} from './logger';
export {
    createProgress,
} from './progress';
export type {
    Progress,
} from './progress';
export {
    RuleSet,
} from './rules';
export {
    StampStore,
} from './stamp';
export {
    CLEAN_STAMPS_TARGET,
    StampTasks,
} from './stamptask';
export type {
    CleanRecipe,
    StampTask,
    StampTaskOptions,
    StampWork,
} from './stamptask';
export type {
    Recipe,
    RecipeContext,
} from './task';
export {
    loadBuildFile,
    parseBuildFile,
} from './config';
export type {
    BuildFile,
} from './config';
