// ─── Project Reconciliation ──────────────────────────────────────────────────

import type { SourceSynchronizer } from './sourceSync';
import type { BuildExecutor } from './buildExecutor';
import type { DeploymentDispatcher } from './dispatcher';
import { formatOutcome } from './status';
import { ProjectType, isSuccessfulOutcome, parseDeploymentKind } from './types';
import type {
	BuildResult,
	DispatchResult,
	ProgressEvent,
	ProgressListener,
	ProjectDefinition,
	ReconciliationOutcome,
	SyncResult,
} from './types';
import type { Logger } from '../daemon/log';

/**
 * Fold the build and dispatch results of a changed project into its outcome.
 * Cancellation wins; otherwise a build problem outranks a dispatch problem.
 */
export function resolveOutcome(build: BuildResult | undefined, dispatch: DispatchResult): ReconciliationOutcome {
	const built = build !== undefined;

	if (dispatch.status === 'cancelled') {
		return { status: 'cancelled', stage: 'dispatch' };
	}
	if (build?.status === 'timed-out') {
		return { status: 'timed-out', stage: 'build', timeoutMs: build.timeoutMs, dispatch };
	}
	if (build?.status === 'failed') {
		return { status: 'build-failed', exitCode: build.exitCode, detail: build.detail, dispatch };
	}
	if (dispatch.status === 'timed-out') {
		return { status: 'timed-out', stage: 'dispatch', timeoutMs: dispatch.timeoutMs };
	}
	if (dispatch.status !== 'done') {
		return { status: 'dispatch-failed', built, dispatch };
	}
	return { status: 'updated', built, dispatch };
}

/**
 * ProjectReconciler - one pass for one project
 *
 * - Pull the working copy (missing path or failed pull ends here)
 * - Stop when the pull brought nothing new
 * - Run the build command, if any
 * - Dispatch the type-specific action, whatever the build did
 *
 * Every failure ends up in the returned outcome; nothing is thrown.
 */
export interface ReconcilerOptions {
	onProgress?: ProgressListener;
}

export class ProjectReconciler {
	private onProgress?: ProgressListener;

	constructor(
		private synchronizer: SourceSynchronizer,
		private builder: BuildExecutor,
		private dispatcher: DeploymentDispatcher,
		private logger: Logger,
		options: ReconcilerOptions = {}
	) {
		this.onProgress = options.onProgress;
	}

	async reconcile(project: ProjectDefinition, signal?: AbortSignal): Promise<ReconciliationOutcome> {
		this.logger.info('reconciler', `Checking ${project.name}`, { path: project.path });
		this.progress(project, { step: 'checking' });

		let synced: SyncResult;
		try {
			synced = await this.synchronizer.sync(project.path, signal);
		} catch (error) {
			return this.finish(project, { status: 'sync-failed', detail: String(error) });
		}

		if (synced.status === 'unchanged' || synced.status === 'changed') {
			this.progress(project, { step: 'pulled', output: synced.output });
		}

		switch (synced.status) {
			case 'path-missing':
				return this.finish(project, { status: 'path-missing', path: project.path });
			case 'failed':
				return this.finish(project, { status: 'sync-failed', detail: synced.output });
			case 'timed-out':
				return this.finish(project, { status: 'timed-out', stage: 'sync', timeoutMs: synced.timeoutMs });
			case 'cancelled':
				return this.finish(project, { status: 'cancelled', stage: 'sync' });
			case 'unchanged':
				return this.finish(project, { status: 'no-change' });
			case 'changed':
				break;
		}

		let build: BuildResult | undefined;
		if (project.buildCommand) {
			this.logger.info('reconciler', `Running build command for ${project.name}`);
			this.progress(project, { step: 'building' });
			try {
				build = await this.builder.run(project.buildCommand, project.path, signal);
			} catch (error) {
				build = { status: 'failed', exitCode: null, detail: String(error) };
			}

			if (build.status === 'cancelled') {
				return this.finish(project, { status: 'cancelled', stage: 'build' });
			}
		}

		const kind = parseDeploymentKind(project.type);
		if (kind.kind === ProjectType.PM2) {
			this.progress(project, { step: 'restarting' });
		}

		let dispatch: DispatchResult;
		try {
			dispatch = await this.dispatcher.dispatch(kind, project.name, signal);
		} catch (error) {
			dispatch = { status: 'restart-failed', detail: String(error) };
		}

		return this.finish(project, resolveOutcome(build, dispatch));
	}

	/**
	 * A failing listener must not turn into a project failure
	 */
	private progress(project: ProjectDefinition, event: ProgressEvent): void {
		try {
			this.onProgress?.(project, event);
		} catch (error) {
			this.logger.error('reconciler', 'Progress listener failed', { project: project.name, error: String(error) });
		}
	}

	private finish(project: ProjectDefinition, outcome: ReconciliationOutcome): ReconciliationOutcome {
		const line = formatOutcome(project.name, outcome);
		if (isSuccessfulOutcome(outcome)) {
			this.logger.info('reconciler', line, { project: project.name, status: outcome.status });
		} else {
			this.logger.warn('reconciler', line, { project: project.name, outcome });
		}
		return outcome;
	}
}
