import {
    suite,
    test,
} from 'mocha-typescript';
import {
    Builder,
    newBuilder,
} from './builder';
import {
    DuplicateRuleError,
    InvalidTaskNameError,
    RecipeFailedError,
    RegistrationClosedError,
    UnknownTaskError,
} from './errors';
import {
    CLEAN_STAMPS_TARGET,
} from './stamptask';
import {
    createSilentProgress,
    FakeClock,
    FakeRunner,
    makeTempDir,
    setMtime,
    T0,
    writeFile,
} from './testkit';
import assert = require('assert');
import path = require('path');
import fs = require('fs-extra');

@suite('StampTasks')
export class StampTasksTest {
    private dir = '';
    private clock = new FakeClock();
    private runs: string[] = [];

    async before(): Promise<void> {
        this.dir = await makeTempDir();
    }

    async after(): Promise<void> {
        await fs.remove(this.dir);
    }

    private newBuilder(): Builder {
        return newBuilder({
            baseDir: this.dir,
            now: this.clock.now,
            progress: createSilentProgress(),
            runner: new FakeRunner(),
        });
    }

    /** Declares `build`, and `test` which needs `build`. */
    private async buildAndTest(): Promise<Builder> {
        const builder = this.newBuilder();
        builder.stamps.declare(['build', 'test']);
        builder.stamps.implement('build', {
            fn: () => {
                this.runs.push('build');
            },
            inputs: ['src/a.c'],
        });
        builder.stamps.implement('test', {
            fn: () => {
                this.runs.push('test');
            },
            inputs: ['test.py'],
            needs: ['build'],
        });
        await writeFile(path.join(this.dir, 'src', 'a.c'), T0);
        await writeFile(path.join(this.dir, 'test.py'), T0);
        return builder;
    }

    @test
    async 'define() derives the task targets'(): Promise<void> {
        const builder = this.newBuilder();
        const task = builder.stamps.define('build');
        assert.deepStrictEqual(task.name, 'build');
        assert.strictEqual(task.stampFile, path.join(this.dir, '.mkdone', '.build_done'));
        assert.strictEqual(task.cleanTarget, 'build-clean');
        assert.strictEqual(task.cleanOverridden, false);
        assert.strictEqual(builder.stamps.stampOf('build'), task.stampFile);
        assert.deepStrictEqual(builder.rules.phonyTargets(), [CLEAN_STAMPS_TARGET, 'env', 'env-clean', 'env-realclean', 'build-clean', 'build']);
        const rule = builder.rules.get('build');
        assert.deepStrictEqual(rule && rule.prerequisites, ['build-clean', task.stampFile]);
    }

    @test
    async 'a task needing another runs after it'(): Promise<void> {
        const builder = await this.buildAndTest();
        const stamps = builder.stamps;

        assert.strictEqual(await builder.make([stamps.stampOf('test')]), 2);
        assert.deepStrictEqual(this.runs, ['build', 'test']);
        assert.strictEqual(await stamps.store.mtime('build'), T0 + 10000);
        assert.strictEqual(await stamps.store.mtime('test'), T0 + 20000);
    }

    @test
    async 'work runs once while inputs are unchanged'(): Promise<void> {
        const builder = await this.buildAndTest();
        await builder.make([builder.stamps.stampOf('test')]);

        assert.strictEqual(await builder.make([builder.stamps.stampOf('test')]), 0);
        assert.deepStrictEqual(this.runs, ['build', 'test']);
    }

    @test
    async 'changed input reruns the task and the tasks needing it'(): Promise<void> {
        const builder = await this.buildAndTest();
        await builder.make([builder.stamps.stampOf('test')]);

        await setMtime(path.join(this.dir, 'src', 'a.c'), this.clock.current() + 5000);
        assert.strictEqual(await builder.make([builder.stamps.stampOf('test')]), 2);
        assert.deepStrictEqual(this.runs, ['build', 'test', 'build', 'test']);

        await setMtime(path.join(this.dir, 'test.py'), this.clock.current() + 5000);
        assert.strictEqual(await builder.make([builder.stamps.stampOf('test')]), 1);
        assert.deepStrictEqual(this.runs, ['build', 'test', 'build', 'test', 'test']);
    }

    @test
    async 'clean target removes only its own stamp'(): Promise<void> {
        const builder = await this.buildAndTest();
        const stamps = builder.stamps;
        await builder.make([stamps.stampOf('test')]);

        await builder.make(['build-clean']);
        assert.strictEqual(await stamps.store.exists('build'), false);
        assert.strictEqual(await stamps.store.mtime('test'), T0 + 20000);

        // The recreated stamp of build is newer than the stamp of test.
        await builder.make([stamps.stampOf('test')]);
        assert.deepStrictEqual(this.runs, ['build', 'test', 'build', 'test']);
    }

    @test
    async 'task target always runs the work'(): Promise<void> {
        const builder = await this.buildAndTest();

        assert.strictEqual(await builder.make(['build']), 2); // build-clean, then the work
        assert.strictEqual(await builder.make(['build']), 2);
        assert.deepStrictEqual(this.runs, ['build', 'build']);
        assert.strictEqual(await builder.stamps.store.mtime('build'), T0 + 20000);
    }

    @test
    async 'task target after a task needing it runs the work again'(): Promise<void> {
        const builder = await this.buildAndTest();

        // test-clean, build, test, build-clean, build
        assert.strictEqual(await builder.make(['test', 'build']), 5);
        assert.deepStrictEqual(this.runs, ['build', 'test', 'build']);
        assert.strictEqual(await builder.stamps.store.mtime('build'), T0 + 30000);
    }

    @test
    async 'failed work leaves no stamp and is retried'(): Promise<void> {
        const builder = this.newBuilder();
        builder.stamps.declare(['lint', 'test']);
        let broken = true;
        builder.stamps.implement('lint', {
            fn: () => {
                this.runs.push('lint');
                if (broken)
                    throw new Error('lint failed');
            },
        });
        builder.stamps.implement('test', {
            fn: () => {
                this.runs.push('test');
            },
            needs: ['lint'],
        });
        const testStamp = builder.stamps.stampOf('test');

        await assert.rejects(builder.make([testStamp]), RecipeFailedError);
        assert.strictEqual(await builder.stamps.store.exists('lint'), false);
        assert.strictEqual(await builder.stamps.store.exists('test'), false);

        broken = false;
        assert.strictEqual(await builder.make([testStamp]), 2);
        assert.deepStrictEqual(this.runs, ['lint', 'lint', 'test']);
        assert.strictEqual(await builder.stamps.store.exists('lint'), true);
    }

    @test
    'declaring a task again changes nothing'(): void {
        const builder = this.newBuilder();
        const [build] = builder.stamps.declare(['build', 'test', 'build']);
        assert.strictEqual(builder.stamps.define('build'), build);
        assert.strictEqual(builder.stamps.define('build', { cleanTarget: 'other-clean' }), build);
        builder.stamps.declare(['test']);

        assert.deepStrictEqual(builder.stamps.list().map(x => x.name), ['build', 'test']);
        assert.deepStrictEqual(builder.stamps.stamps(), [
            builder.stamps.stampOf('build'),
            builder.stamps.stampOf('test'),
        ]);
        assert.strictEqual(builder.rules.has('other-clean'), false);
    }

    @test
    async 'clean-stamps removes every stamp'(): Promise<void> {
        const builder = this.newBuilder();
        const stamps = builder.stamps;
        stamps.declare(['a', 'b', 'c']);
        for (const name of ['a', 'b', 'c'])
            stamps.implement(name, { fn: () => undefined });
        await builder.make([stamps.stampOf('a'), stamps.stampOf('c')]);
        assert.strictEqual(await stamps.store.exists('a'), true);

        await builder.make([CLEAN_STAMPS_TARGET]);
        for (const name of ['a', 'b', 'c'])
            assert.strictEqual(await stamps.store.exists(name), false);

        assert.strictEqual(await builder.make([stamps.stampOf('b'), CLEAN_STAMPS_TARGET, stamps.stampOf('b')]), 3);
        assert.strictEqual(await stamps.store.exists('b'), true);
    }

    @test
    async 'custom clean replaces the default one'(): Promise<void> {
        const builder = this.newBuilder();
        const artifact = path.join(this.dir, 'site', 'index.html');
        const [docs] = builder.stamps.declare(['docs'], {
            docs: async task => {
                await fs.remove(artifact);
                await fs.remove(task.stampFile);
            },
        });
        assert.strictEqual(docs.cleanOverridden, true);
        builder.stamps.implement('docs', {
            fn: () => fs.outputFile(artifact, 'docs'),
        });

        await builder.make(['docs']);
        assert.strictEqual(await fs.pathExists(artifact), true);

        await builder.make(['docs-clean']);
        assert.strictEqual(await fs.pathExists(artifact), false);
        assert.strictEqual(await builder.stamps.store.exists('docs'), false);
    }

    @test
    'custom clean target name'(): void {
        const builder = this.newBuilder();
        const task = builder.stamps.define('pong6', { cleanTarget: 'pong6-wipe' });
        assert.strictEqual(task.cleanTarget, 'pong6-wipe');
        assert.strictEqual(builder.rules.isPhony('pong6-wipe'), true);
        assert.strictEqual(builder.rules.has('pong6-clean'), false);
    }

    @test
    'task name taken by another target'(): void {
        const builder = this.newBuilder();
        builder.stamps.define('x');

        assert.throws(() => builder.stamps.define('x-clean'), DuplicateRuleError);
        assert.strictEqual(builder.stamps.has('x-clean'), false);
        assert.strictEqual(builder.rules.has('x-clean-clean'), false);
        assert.throws(() => builder.stamps.define('y', { cleanTarget: 'x' }), DuplicateRuleError);
        assert.strictEqual(builder.rules.has('y'), false);
        assert.throws(() => builder.stamps.define('z', { cleanTarget: 'z' }), DuplicateRuleError);
        assert.strictEqual(builder.rules.has('z'), false);
        assert.deepStrictEqual(builder.stamps.stamps(), [builder.stamps.stampOf('x')]);
    }

    @test
    async 'no new task once a make started'(): Promise<void> {
        const builder = this.newBuilder();
        builder.stamps.define('build');
        await builder.make(['build-clean']);

        assert.throws(() => builder.stamps.define('late'), RegistrationClosedError);
        assert.strictEqual(builder.stamps.define('build').name, 'build');
    }

    @test
    'invalid and unknown task names'(): void {
        const builder = this.newBuilder();
        assert.throws(() => builder.stamps.define(''), InvalidTaskNameError);
        assert.throws(() => builder.stamps.define('a/b'), InvalidTaskNameError);
        assert.throws(() => builder.stamps.stampOf('nope'), UnknownTaskError);
        assert.throws(() => builder.stamps.implement('nope', { fn: () => undefined }), UnknownTaskError);
    }
}
