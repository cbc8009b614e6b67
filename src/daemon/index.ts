// ─── Module Exports ──────────────────────────────────────────────────────────

export { UpdateDaemon } from './updateDaemon';
export type { UpdateDaemonOptions, BuildOnlyResult } from './updateDaemon';
export { Scheduler, systemClock, abortableSleep } from './scheduler';
export type { SchedulerClock, SchedulerOptions } from './scheduler';
export {
	ConfigSchema,
	loadConfig,
	parseConfig,
	validateConfig,
	resolveConfigPath,
	defaultConfigPath,
	writeDefaultConfig,
	findProject,
} from './config';
export type { UpdatectlConfig } from './config';
export { Logger } from './log';
export type { LogLevel, LogEntry, LoggerOptions } from './log';

export { ProjectReconciler, resolveOutcome } from '../core/reconciler';
export { SourceSynchronizer, looksUnchanged } from '../core/sourceSync';
export { BuildExecutor, shellInvocation } from '../core/buildExecutor';
export { DeploymentDispatcher } from '../core/dispatcher';
export { ChildProcessRunner } from '../core/processRunner';
export type { ProcessRunner, ProcessResult, RunOptions } from '../core/processRunner';
export { formatOutcome, formatProgress } from '../core/status';
export { UpdatectlError, ErrorCode } from '../core/errors';
export { ProjectType, parseDeploymentKind, isSuccessfulOutcome } from '../core/types';
export type {
	ProjectDefinition,
	DeploymentKind,
	ReconciliationOutcome,
	SyncResult,
	BuildResult,
	DispatchResult,
	PassReport,
	ProgressEvent,
	ProgressListener,
} from '../core/types';
