/**
 * @module
 * Build files: JSON descriptions of stamp tasks, tools and phony targets.
 *
 * ```json
 * {
 *   "stampDir": "build/.mkdone",
 *   "tools": { "pytest": {}, "pip-compile": { "source": "pip-tools" } },
 *   "tasks": {
 *     "test-run": {
 *       "inputs": ["src/**\/*.py"],
 *       "tools": ["pytest"],
 *       "commands": [["${pytest}", "test"]]
 *     }
 *   },
 *   "phony": { "all": ["test-run"] },
 *   "default": ["all"]
 * }
 * ```
 */
import {
    Builder,
    BuilderOptions,
    newBuilder,
} from './builder';
import {
    commandRecipe,
    describeCommands,
} from './cmdtask';
import {
    ConfigError,
} from './errors';
import {
    CleanRecipe,
} from './stamptask';
import {
    z,
} from 'zod';
import path = require('path');
import fs = require('fs-extra');
import fg = require('fast-glob');

const Commands = z.string().array().nonempty().array();

const ToolSpec = z.object({
    requires: z.string().array().default([]).describe('Targets to make before installing the tool.'),
    requiresTools: z.string().array().default([]).describe('Tools to install before installing the tool.'),
    source: z.string().optional().describe('Package providing the tool. Default: the tool name.'),
}).strict();
type ToolSpec = z.infer<typeof ToolSpec>;

const TaskSpec = z.object({
    clean: Commands.optional().describe('Commands replacing the default clean. The stamp is removed after them.'),
    commands: Commands.default([]).describe('Commands doing the work. `${tool}` stands for the tool\'s command path.'),
    description: z.string().optional(),
    inputs: z.string().array().default([]).describe('Input files or glob patterns.'),
    needs: z.string().array().default([]).describe('Tasks whose results the work needs.'),
    tools: z.string().array().default([]).describe('Tools the commands run.'),
}).strict();

const EnvSpec = z.object({
    binDir: z.string().optional(),
    descriptor: z.string().optional(),
    dir: z.string().optional(),
    installOptions: z.string().array().optional(),
    installer: z.string().array().nonempty().optional(),
    provision: z.string().array().nonempty().optional(),
    provisionInputs: z.string().array().optional(),
    stampTasks: z.string().array().optional().describe('Tasks whose stamps env-clean removes.'),
}).strict();

export const BuildFile = z.object({
    default: z.string().array().default([]).describe('Targets made when none is given.'),
    env: EnvSpec.default({}),
    phony: z.record(z.string().array()).default({}).describe('Phony targets and their prerequisites.'),
    stampDir: z.string().default('.mkdone'),
    tasks: z.record(TaskSpec).default({}),
    tools: z.union([z.string().array(), z.record(ToolSpec)]).default([]),
}).strict();
export type BuildFile = z.infer<typeof BuildFile>;

/**
 * A build created from a build file.
 */
export interface LoadedBuild {
    builder: Builder;
    /** Targets to make when none is given. */
    defaultTargets: string[];
}

/**
 * Validates the parsed contents of build file `filename`.
 */
export function parseBuildFile(data: unknown, filename: string): BuildFile {
    const result = BuildFile.safeParse(data);
    if (!result.success) {
        throw new ConfigError(filename, result.error.issues.map(issue =>
            `${issue.path.join('.') || '<root>'}: ${issue.message}`));
    }
    return result.data;
}

/**
 * Reads build file `filename` and creates its build. Relative paths in the
 * file are relative to its directory unless `options.baseDir` is given.
 */
export async function loadBuildFile(filename: string, options?: BuilderOptions): Promise<LoadedBuild> {
    const contents = await fs.readFile(filename, 'utf-8');
    let data: unknown;
    try {
        data = JSON.parse(contents);
    } catch (e) {
        throw new ConfigError(filename, [e instanceof Error ? e.message : String(e)]);
    }
    const buildFile = parseBuildFile(data, filename);
    const builder = newBuilder({
        ...options,
        baseDir: (options && options.baseDir) || path.dirname(path.resolve(filename)),
        env: buildFile.env,
        stampDir: buildFile.stampDir,
    });
    await applyBuildFile(builder, buildFile, filename);
    return {
        builder,
        defaultTargets: buildFile.default,
    };
}

/**
 * Declares the tools, tasks and phony targets of `buildFile` on `builder`.
 */
export async function applyBuildFile(builder: Builder, buildFile: BuildFile, filename: string): Promise<void> {
    const toolSpecs = new Map<string, ToolSpec>(Array.isArray(buildFile.tools) ?
        buildFile.tools.map((name): [string, ToolSpec] => [name, ToolSpec.parse({})]) :
        Object.entries(buildFile.tools));
    // Tools run by tasks need no entry of their own.
    for (const task of Object.values(buildFile.tasks)) {
        for (const name of task.tools) {
            if (!toolSpecs.has(name))
                toolSpecs.set(name, ToolSpec.parse({}));
        }
    }

    const issues: string[] = [];
    for (const [name, spec] of toolSpecs) {
        for (const required of spec.requiresTools) {
            if (!toolSpecs.has(required))
                issues.push(`tools.${name}.requiresTools: unknown tool '${required}'`);
        }
    }
    const taskNames = new Set(Object.keys(buildFile.tasks));
    for (const [name, task] of Object.entries(buildFile.tasks)) {
        for (const needed of task.needs) {
            if (!taskNames.has(needed))
                issues.push(`tasks.${name}.needs: unknown task '${needed}'`);
        }
        for (const command of [...task.commands, ...(task.clean || [])]) {
            for (const ref of toolRefs(command)) {
                if (!toolSpecs.has(ref))
                    issues.push(`tasks.${name}: unknown tool '${ref}' in command`);
            }
        }
    }
    for (const name of buildFile.env.stampTasks || []) {
        if (!taskNames.has(name))
            issues.push(`env.stampTasks: unknown task '${name}'`);
    }
    if (issues.length)
        throw new ConfigError(filename, issues);

    const tools = builder.tools;
    for (const [name, spec] of toolSpecs) {
        const requires = [
            ...spec.requires,
            ...spec.requiresTools.map(x => path.join(tools.binDir, x)),
        ];
        tools.define(name, {
            requires: requires.length ? requires : undefined,
            source: spec.source,
        });
    }

    const cleanOverrides: Record<string, CleanRecipe> = {};
    for (const [name, task] of Object.entries(buildFile.tasks)) {
        const cleanCommands = task.clean;
        if (!cleanCommands)
            continue;
        const clean = commandRecipe(cleanCommands.map(x => substituteTools(x, builder)), builder.runner);
        cleanOverrides[name] = async (stampTask, ctx) => {
            await clean(ctx);
            await fs.remove(stampTask.stampFile);
        };
    }
    builder.stamps.declare(taskNames, cleanOverrides);

    for (const [name, task] of Object.entries(buildFile.tasks)) {
        const commands = task.commands.map(x => substituteTools(x, builder));
        builder.stamps.implement(name, {
            description: task.description || (commands.length ? describeCommands(commands) : name),
            fn: commandRecipe(commands, builder.runner),
            inputs: await expandInputs(task.inputs, builder.rules.baseDir),
            needs: task.needs,
            tools: task.tools,
        });
    }

    for (const [name, prerequisites] of Object.entries(buildFile.phony))
        builder.rules.addPhonyRule(name, prerequisites);
}

const TOOL_REF = /\$\{([^}]+)\}/g;

function toolRefs(command: readonly string[]): string[] {
    const refs: string[] = [];
    for (const arg of command) {
        for (const match of arg.matchAll(TOOL_REF))
            refs.push(match[1]);
    }
    return refs;
}

function substituteTools(command: readonly string[], builder: Builder): string[] {
    return command.map(arg => arg.replace(TOOL_REF, (_match, name: string) => builder.tools.commandPath(name)));
}

/**
 * Expands glob patterns in `inputs`. Plain paths are kept as they are, so that
 * a missing input is reported when making the task.
 */
async function expandInputs(inputs: readonly string[], cwd: string): Promise<string[]> {
    const expanded: string[] = [];
    for (const input of inputs) {
        if (!fg.isDynamicPattern(input)) {
            expanded.push(input);
            continue;
        }
        const matches = await fg(input, { cwd, onlyFiles: true });
        expanded.push(...matches.sort());
    }
    return expanded;
}
