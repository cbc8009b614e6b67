// ─── Build Executor Tests ────────────────────────────────────────────────────

import { describe, it, expect, beforeEach } from 'vitest';
import { BuildExecutor, shellInvocation } from '../../core/buildExecutor';
import { FakeRunner, processResult } from '../helpers/fakeRunner';

describe('shellInvocation', () => {
	it('uses bash -c on POSIX hosts', () => {
		expect(shellInvocation('make all', 'linux')).toEqual({ command: 'bash', args: ['-c', 'make all'] });
		expect(shellInvocation('make all', 'darwin')).toEqual({ command: 'bash', args: ['-c', 'make all'] });
	});

	it('uses cmd /C on Windows', () => {
		expect(shellInvocation('npm run build', 'win32')).toEqual({ command: 'cmd', args: ['/C', 'npm run build'] });
	});
});

describe('BuildExecutor', () => {
	let runner: FakeRunner;
	let executor: BuildExecutor;

	beforeEach(() => {
		runner = new FakeRunner();
		executor = new BuildExecutor(runner, { platform: 'linux', timeoutMs: 3_600_000 });
	});

	it('runs the command in the working directory with inherited output', async () => {
		const controller = new AbortController();

		const result = await executor.run('docker compose up -d --build', '/srv/shop', controller.signal);

		expect(result).toEqual({ status: 'success' });
		expect(runner.calls).toEqual([
			{
				command: 'bash',
				args: ['-c', 'docker compose up -d --build'],
				options: { cwd: '/srv/shop', output: 'inherit', timeoutMs: 3_600_000, signal: controller.signal },
			},
		]);
	});

	it('reports the exit status of a failed build', async () => {
		runner.respond('bash', processResult({ exitCode: 127 }));

		expect(await executor.run('missing-tool', '/srv/shop')).toEqual({ status: 'failed', exitCode: 127 });
	});

	it('reports a spawn error without an exit status', async () => {
		runner.respond('bash', processResult({ exitCode: null, error: 'spawn bash ENOENT' }));

		expect(await executor.run('make', '/srv/shop')).toEqual({
			status: 'failed',
			exitCode: null,
			detail: 'spawn bash ENOENT',
		});
	});

	it('reports a timeout', async () => {
		runner.respond('bash', processResult({ exitCode: null, signal: 'SIGKILL', timedOut: true }));

		expect(await executor.run('sleep 7200', '/srv/shop')).toEqual({ status: 'timed-out', timeoutMs: 3_600_000 });
	});

	it('reports cancellation', async () => {
		runner.respond('bash', processResult({ exitCode: null, signal: 'SIGTERM', aborted: true }));

		expect(await executor.run('make', '/srv/shop')).toEqual({ status: 'cancelled' });
	});
});
