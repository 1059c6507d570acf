import {
    suite,
    test,
} from 'mocha-typescript';
import {
    commandRecipe,
    createSpawnRunner,
    describeCommands,
    quote,
} from './cmdtask';
import {
    CommandFailedError,
} from './errors';
import {
    RecipeContext,
} from './task';
import {
    FakeRunner,
} from './testkit';
import assert = require('assert');

function newContext(): RecipeContext {
    return {
        output: [],
        prerequisites: [],
        target: 'test',
    };
}

@suite('Command recipes')
export class CommandRecipeTest {
    @test
    'quote()'(): void {
        assert.strictEqual(quote(''), '\'\'');
        assert.strictEqual(quote('src/pkg-1.0/a.py'), 'src/pkg-1.0/a.py');
        assert.strictEqual(quote('a b'), '\'a b\'');
        assert.strictEqual(quote('it\'s'), '\'it\'"\'"\'s\'');
    }

    @test
    'describeCommands()'(): void {
        assert.strictEqual(describeCommands([['echo', 'a b'], ['ls']]), 'echo \'a b\' && ls');
    }

    @test
    async 'commandRecipe() stops at the first failing command'(): Promise<void> {
        const runner = new FakeRunner().fail('false');
        const recipe = commandRecipe([['true'], ['false'], ['echo']], runner);
        const ctx = newContext();

        await assert.rejects(async () => recipe(ctx), CommandFailedError);
        assert.deepStrictEqual(runner.lines(), ['true', 'false']);
        assert.strictEqual(Buffer.concat(ctx.output).toString(), 'true\nfalse\n');
    }

    @test
    async 'spawn runner collects output'(): Promise<void> {
        const output: Buffer[] = [];
        await createSpawnRunner().run([process.execPath, '-e', 'process.stdout.write("ok")'], output);
        assert.strictEqual(Buffer.concat(output).toString(), 'ok');
    }

    @test
    async 'spawn runner rejects on non-zero exit'(): Promise<void> {
        const output: Buffer[] = [];
        await assert.rejects(
            createSpawnRunner().run([process.execPath, '-e', 'process.stderr.write("bad"); process.exitCode = 3'], output),
            (e: unknown) => e instanceof CommandFailedError && e.code === 3);
        assert.strictEqual(Buffer.concat(output).toString(), 'bad');
    }
}
