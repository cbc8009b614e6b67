// ─── Deployment Dispatcher ───────────────────────────────────────────────────

import { failureDetail } from './processRunner';
import type { ProcessRunner } from './processRunner';
import { ProjectType } from './types';
import type { DeploymentKind, DispatchResult } from './types';
import type { Logger } from '../daemon/log';

export interface DispatcherOptions {
	/** Limit for the process-manager restart in milliseconds; 0 disables */
	timeoutMs?: number;
	pm2?: string;
}

/**
 * DeploymentDispatcher - the type-specific step after a change was pulled
 * (and built, when the project has a build command).
 */
export class DeploymentDispatcher {
	private timeoutMs: number;
	private pm2: string;

	constructor(
		private runner: ProcessRunner,
		private logger: Logger,
		options: DispatcherOptions = {}
	) {
		this.timeoutMs = options.timeoutMs ?? 0;
		this.pm2 = options.pm2 ?? 'pm2';
	}

	async dispatch(kind: DeploymentKind, projectName: string, signal?: AbortSignal): Promise<DispatchResult> {
		switch (kind.kind) {
			case ProjectType.DOCKER:
				// The build command already brought the containers up
				return { status: 'done', action: 'none' };
			case ProjectType.STATIC:
				return { status: 'done', action: 'none' };
			case ProjectType.PM2:
				return this.restartPm2(projectName, signal);
			case 'other':
				this.logger.warn('dispatcher', `Unknown type: ${kind.raw}`, { project: projectName });
				return { status: 'unknown-type', type: kind.raw };
			default:
				return assertNever(kind);
		}
	}

	/**
	 * A failed restart is reported, never thrown: the old process keeps serving.
	 */
	private async restartPm2(projectName: string, signal?: AbortSignal): Promise<DispatchResult> {
		this.logger.info('dispatcher', `Restarting PM2 process: ${projectName}`);

		const result = await this.runner.run(this.pm2, ['restart', projectName], {
			output: 'inherit',
			timeoutMs: this.timeoutMs,
			signal,
		});

		if (result.aborted) {
			return { status: 'cancelled' };
		}
		if (result.timedOut) {
			this.logger.error('dispatcher', `PM2 restart timed out for ${projectName}`, { timeoutMs: this.timeoutMs });
			return { status: 'timed-out', timeoutMs: this.timeoutMs };
		}
		if (result.error || result.exitCode !== 0) {
			const detail = failureDetail(result);
			this.logger.error('dispatcher', `PM2 restart failed for ${projectName}`, { detail });
			return { status: 'restart-failed', detail };
		}
		return { status: 'done', action: 'restarted' };
	}
}

function assertNever(value: never): never {
	throw new Error(`Unhandled deployment kind: ${JSON.stringify(value)}`);
}
