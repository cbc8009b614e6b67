// ─── Update Daemon ───────────────────────────────────────────────────────────

import { BuildExecutor } from '../core/buildExecutor';
import { DeploymentDispatcher } from '../core/dispatcher';
import { ChildProcessRunner } from '../core/processRunner';
import type { ProcessRunner } from '../core/processRunner';
import { ProjectReconciler } from '../core/reconciler';
import { SourceSynchronizer } from '../core/sourceSync';
import type { BuildResult, PassReport, ProgressListener, ProjectDefinition } from '../core/types';
import { findProject, processTimeouts } from './config';
import type { UpdatectlConfig } from './config';
import { Logger } from './log';
import { Scheduler } from './scheduler';
import type { SchedulerClock } from './scheduler';

export interface UpdateDaemonOptions {
	/** Echo structured log lines to stderr at debug level */
	verbose?: boolean;
	runner?: ProcessRunner;
	logger?: Logger;
	clock?: SchedulerClock;
	onOutcome?: (report: PassReport) => void;
	onProgress?: ProgressListener;
}

export type BuildOnlyResult =
	| { project: ProjectDefinition; skipped: true }
	| { project: ProjectDefinition; skipped: false; result: BuildResult };

/**
 * UpdateDaemon - wires the engine from a loaded config
 *
 * Lifecycle:
 * 1. Build logger and process runner
 * 2. Compose synchronizer, build executor, dispatcher and reconciler
 * 3. Run passes (watch) or a single project (update/build)
 * 4. SIGINT/SIGTERM abort the loop and any running child process
 */
export class UpdateDaemon {
	private logger: Logger;
	private builder: BuildExecutor;
	private scheduler: Scheduler;
	private abortController = new AbortController();

	constructor(private config: UpdatectlConfig, options: UpdateDaemonOptions = {}) {
		this.logger = options.logger ?? new Logger({
			level: options.verbose ? 'debug' : config.logLevel,
			logFile: config.logFile,
			console: options.verbose ?? false,
			maxFileSizeBytes: config.logMaxSizeMB * 1024 * 1024,
			maxBackups: config.logMaxBackups,
		});

		const runner = options.runner ?? new ChildProcessRunner();
		const timeouts = processTimeouts(config);

		const synchronizer = new SourceSynchronizer(runner, this.logger, { timeoutMs: timeouts.syncMs });
		this.builder = new BuildExecutor(runner, { timeoutMs: timeouts.buildMs });
		const dispatcher = new DeploymentDispatcher(runner, this.logger, { timeoutMs: timeouts.restartMs });
		const reconciler = new ProjectReconciler(synchronizer, this.builder, dispatcher, this.logger, {
			onProgress: options.onProgress,
		});

		this.scheduler = new Scheduler(reconciler, this.logger, {
			clock: options.clock,
			onOutcome: options.onOutcome,
		});
	}

	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	/**
	 * Run passes until stopped
	 */
	async watch(): Promise<void> {
		const removeHandlers = this.setupSignalHandlers();
		try {
			await this.scheduler.runForever(this.config.projects, this.config.intervalMinutes, this.signal);
		} finally {
			removeHandlers();
		}
	}

	/**
	 * Full reconciliation of one named project
	 */
	async update(projectName: string): Promise<PassReport> {
		const project = findProject(this.config, projectName);
		const removeHandlers = this.setupSignalHandlers();
		try {
			return await this.scheduler.runOnePass(project, this.signal);
		} finally {
			removeHandlers();
		}
	}

	/**
	 * Run only the build command of one named project, without pulling
	 */
	async build(projectName: string): Promise<BuildOnlyResult> {
		const project = findProject(this.config, projectName);
		if (!project.buildCommand) {
			return { project, skipped: true };
		}

		this.logger.info('daemon', `Building project ${project.name}`);
		const removeHandlers = this.setupSignalHandlers();
		try {
			const result = await this.builder.run(project.buildCommand, project.path, this.signal);
			return { project, skipped: false, result };
		} finally {
			removeHandlers();
		}
	}

	stop(reason = 'stop requested'): void {
		if (this.abortController.signal.aborted) {
			return;
		}
		this.logger.info('daemon', `Stopping: ${reason}`);
		this.abortController.abort();
	}

	private setupSignalHandlers(): () => void {
		const onSigterm = (): void => this.stop('received SIGTERM');
		const onSigint = (): void => this.stop('received SIGINT');

		process.on('SIGTERM', onSigterm);
		process.on('SIGINT', onSigint);

		return () => {
			process.off('SIGTERM', onSigterm);
			process.off('SIGINT', onSigint);
		};
	}
}
