// ─── Build Executor ──────────────────────────────────────────────────────────

import type { ProcessRunner } from './processRunner';
import type { BuildResult } from './types';

export interface ShellInvocation {
	command: string;
	args: string[];
}

/**
 * How the host interpreter is asked to run a command line
 */
export function shellInvocation(commandLine: string, platform: NodeJS.Platform = process.platform): ShellInvocation {
	if (platform === 'win32') {
		return { command: 'cmd', args: ['/C', commandLine] };
	}
	return { command: 'bash', args: ['-c', commandLine] };
}

export interface BuildExecutorOptions {
	/** Per-build limit in milliseconds; 0 disables */
	timeoutMs?: number;
	platform?: NodeJS.Platform;
}

/**
 * BuildExecutor - runs a project's build command with output streamed live.
 * The command is trusted operator configuration.
 */
export class BuildExecutor {
	private timeoutMs: number;
	private platform: NodeJS.Platform;

	constructor(private runner: ProcessRunner, options: BuildExecutorOptions = {}) {
		this.timeoutMs = options.timeoutMs ?? 0;
		this.platform = options.platform ?? process.platform;
	}

	async run(commandLine: string, workingDir: string, signal?: AbortSignal): Promise<BuildResult> {
		const { command, args } = shellInvocation(commandLine, this.platform);
		const result = await this.runner.run(command, args, {
			cwd: workingDir,
			output: 'inherit',
			timeoutMs: this.timeoutMs,
			signal,
		});

		if (result.aborted) {
			return { status: 'cancelled' };
		}
		if (result.timedOut) {
			return { status: 'timed-out', timeoutMs: this.timeoutMs };
		}
		if (result.error) {
			return { status: 'failed', exitCode: null, detail: result.error };
		}
		if (result.exitCode !== 0) {
			return { status: 'failed', exitCode: result.exitCode };
		}
		return { status: 'success' };
	}
}
