// ─── Scheduler Loop ──────────────────────────────────────────────────────────

import type { ProjectReconciler } from '../core/reconciler';
import { isSuccessfulOutcome } from '../core/types';
import type { PassReport, ProjectDefinition } from '../core/types';
import type { Logger } from './log';

export interface SchedulerClock {
	now(): number;
	/** Resolves after ms, or as soon as the signal aborts */
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}

		const onAbort = (): void => {
			clearTimeout(timer);
			resolve();
		};

		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);

		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

export const systemClock: SchedulerClock = {
	now: () => Date.now(),
	sleep: abortableSleep,
};

export interface SchedulerOptions {
	clock?: SchedulerClock;
	/** Called once per project as soon as its outcome is known */
	onOutcome?: (report: PassReport) => void;
}

/**
 * Scheduler - drives the reconciler over the project list
 *
 * Passes run projects one after another in configuration order and never
 * overlap. Consecutive passes start intervalMinutes apart; a pass that runs
 * longer simply delays the next one.
 */
export class Scheduler {
	private clock: SchedulerClock;
	private onOutcome?: (report: PassReport) => void;

	constructor(
		private reconciler: ProjectReconciler,
		private logger: Logger,
		options: SchedulerOptions = {}
	) {
		this.clock = options.clock ?? systemClock;
		this.onOutcome = options.onOutcome;
	}

	/**
	 * Reconcile every project once. Projects not yet started when the signal
	 * aborts are left out of the result.
	 */
	async runPass(projects: readonly ProjectDefinition[], signal?: AbortSignal): Promise<PassReport[]> {
		const reports: PassReport[] = [];

		for (const project of projects) {
			if (signal?.aborted) {
				break;
			}
			reports.push(await this.runOnePass(project, signal));
		}

		return reports;
	}

	async runOnePass(project: ProjectDefinition, signal?: AbortSignal): Promise<PassReport> {
		const started = this.clock.now();
		const outcome = await this.reconciler.reconcile(project, signal);
		const report: PassReport = { project, outcome, durationMs: this.clock.now() - started };

		try {
			this.onOutcome?.(report);
		} catch (error) {
			this.logger.error('scheduler', 'Outcome listener failed', { project: project.name, error: String(error) });
		}
		return report;
	}

	/**
	 * Repeat passes until the signal aborts
	 */
	async runForever(projects: readonly ProjectDefinition[], intervalMinutes: number, signal?: AbortSignal): Promise<void> {
		const intervalMs = intervalMinutes * 60_000;
		let pass = 0;

		this.logger.info('scheduler', `Running every ${intervalMinutes} minutes`, { projects: projects.length });

		while (!signal?.aborted) {
			pass++;
			const started = this.clock.now();
			const reports = await this.runPass(projects, signal);
			const elapsed = this.clock.now() - started;

			this.logger.info('scheduler', `Pass ${pass} complete`, {
				elapsedMs: elapsed,
				ok: reports.filter(r => isSuccessfulOutcome(r.outcome)).length,
				failed: reports.filter(r => !isSuccessfulOutcome(r.outcome)).length,
			});

			if (signal?.aborted) {
				break;
			}

			if (elapsed > intervalMs) {
				this.logger.warn('scheduler', `Pass ${pass} took longer than the interval, starting the next one now`);
			}

			await this.clock.sleep(Math.max(0, intervalMs - elapsed), signal);
		}

		this.logger.info('scheduler', 'Scheduler stopped', { passes: pass });
	}
}
