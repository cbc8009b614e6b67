// ─── External Process Execution ──────────────────────────────────────────────

import * as cp from 'child_process';

export type OutputMode = 'capture' | 'inherit';

export interface RunOptions {
	cwd?: string;
	/** capture: collect stdout+stderr into the result. inherit: stream to this process */
	output?: OutputMode;
	/** Milliseconds before the child is terminated; 0 or unset means no limit */
	timeoutMs?: number;
	signal?: AbortSignal;
}

export interface ProcessResult {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	/** Combined stdout and stderr. Always empty in inherit mode */
	output: string;
	timedOut: boolean;
	aborted: boolean;
	/** Set when the process could not be spawned at all */
	error?: string;
}

/**
 * ProcessRunner - every external command the engine issues goes through here,
 * so tests can swap in a fake and production runs stay bounded.
 */
export interface ProcessRunner {
	run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessResult>;
}

/** Delay between SIGTERM and SIGKILL when a child is being stopped */
export const KILL_GRACE_MS = 5000;

export interface ChildProcessRunnerOptions {
	platform?: NodeJS.Platform;
}

/**
 * On POSIX every child leads its own process group, so stopping it also
 * stops whatever it started (the ssh behind git, a build's background jobs).
 * Once a stop was requested the result settles on the child's exit; pipes
 * still held open by a surviving descendant are destroyed.
 */
export class ChildProcessRunner implements ProcessRunner {
	private platform: NodeJS.Platform;

	constructor(options: ChildProcessRunnerOptions = {}) {
		this.platform = options.platform ?? process.platform;
	}

	run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
		const { cwd, output: mode = 'capture', timeoutMs = 0, signal } = options;

		if (signal?.aborted) {
			return Promise.resolve({
				exitCode: null,
				signal: null,
				output: '',
				timedOut: false,
				aborted: true,
			});
		}

		const ownGroup = this.platform !== 'win32';

		return new Promise<ProcessResult>((resolve) => {
			let output = '';
			let settled = false;
			let timedOut = false;
			let aborted = false;
			let exited: { code: number | null; signal: NodeJS.Signals | null } | undefined;
			let killTimer: NodeJS.Timeout | undefined;

			const proc = cp.spawn(command, [...args], {
				cwd,
				stdio: mode === 'inherit' ? ['ignore', 'inherit', 'inherit'] : ['ignore', 'pipe', 'pipe'],
				windowsHide: true,
				detached: ownGroup,
			});

			const signalGroup = (sig: NodeJS.Signals): boolean => {
				if (!ownGroup || proc.pid === undefined) {
					return false;
				}
				try {
					process.kill(-proc.pid, sig);
					return true;
				} catch {
					// ESRCH: nothing left in the group
					return false;
				}
			};

			const sendSignal = (sig: NodeJS.Signals): void => {
				if (!signalGroup(sig)) {
					proc.kill(sig);
				}
			};

			const settle = (result: ProcessResult): void => {
				if (settled) { return; }
				settled = true;
				clearTimeout(timer);
				clearTimeout(killTimer);
				signal?.removeEventListener('abort', onAbort);
				if (timedOut || aborted) {
					proc.stdout?.destroy();
					proc.stderr?.destroy();
				}
				resolve(result);
			};

			const settleOnExit = (code: number | null, sig: NodeJS.Signals | null): void => {
				settle({ exitCode: code, signal: sig, output, timedOut, aborted });
			};

			const terminate = (): void => {
				sendSignal('SIGTERM');
				if (exited) {
					// The child is gone; only descendants were holding the pipes
					signalGroup('SIGKILL');
					settleOnExit(exited.code, exited.signal);
					return;
				}
				killTimer = setTimeout(() => sendSignal('SIGKILL'), KILL_GRACE_MS);
			};

			const timer = timeoutMs > 0
				? setTimeout(() => {
					timedOut = true;
					terminate();
				}, timeoutMs)
				: undefined;

			const onAbort = (): void => {
				aborted = true;
				terminate();
			};
			signal?.addEventListener('abort', onAbort, { once: true });

			proc.stdout?.setEncoding('utf8');
			proc.stderr?.setEncoding('utf8');
			proc.stdout?.on('data', (chunk: string) => { output += chunk; });
			proc.stderr?.on('data', (chunk: string) => { output += chunk; });

			proc.on('error', (err) => {
				settle({ exitCode: null, signal: null, output, timedOut, aborted, error: err.message });
			});

			proc.on('exit', (code, sig) => {
				exited = { code, signal: sig };
				if (timedOut || aborted) {
					signalGroup('SIGKILL');
					settleOnExit(code, sig);
				}
			});

			proc.on('close', settleOnExit);
		});
	}
}

/**
 * Short human-readable reason for a failed process
 */
export function failureDetail(result: ProcessResult): string {
	const text = result.output.trim();
	if (text) {
		return text;
	}
	if (result.error) {
		return result.error;
	}
	if (result.signal) {
		return `terminated by ${result.signal}`;
	}
	return `exit status ${result.exitCode}`;
}
