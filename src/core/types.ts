// ─── Core Types ──────────────────────────────────────────────────────────────

/**
 * A configured deployable unit. Read-only to the engine.
 */
export interface ProjectDefinition {
	name: string;
	/** Filesystem location of the git working copy */
	path: string;
	/** Upstream URL, informational only */
	repo: string;
	/** Deployment kind as written in the config (see parseDeploymentKind) */
	type: string;
	/** Shell command run after a change; empty means no build step */
	buildCommand: string;
}

// ─── Deployment Kinds ────────────────────────────────────────────────────────

export enum ProjectType {
	DOCKER = 'docker',
	PM2 = 'pm2',
	STATIC = 'static',
}

export type DeploymentKind =
	| { kind: ProjectType.DOCKER }
	| { kind: ProjectType.PM2 }
	| { kind: ProjectType.STATIC }
	| { kind: 'other'; raw: string };

const KNOWN_TYPES: readonly string[] = Object.values(ProjectType);

function isProjectType(value: string): value is ProjectType {
	return KNOWN_TYPES.includes(value);
}

/**
 * Map a config type string onto the closed set. Matching is exact.
 */
export function parseDeploymentKind(type: string): DeploymentKind {
	if (!isProjectType(type)) {
		return { kind: 'other', raw: type };
	}
	switch (type) {
		case ProjectType.DOCKER:
			return { kind: ProjectType.DOCKER };
		case ProjectType.PM2:
			return { kind: ProjectType.PM2 };
		case ProjectType.STATIC:
			return { kind: ProjectType.STATIC };
	}
}

// ─── Stage Results ───────────────────────────────────────────────────────────

export type Stage = 'sync' | 'build' | 'dispatch';

export type SyncResult =
	| { status: 'path-missing' }
	| { status: 'unchanged'; output: string }
	| { status: 'changed'; output: string }
	| { status: 'failed'; output: string }
	| { status: 'timed-out'; timeoutMs: number }
	| { status: 'cancelled' };

export type BuildResult =
	| { status: 'success' }
	| { status: 'failed'; exitCode: number | null; detail?: string }
	| { status: 'timed-out'; timeoutMs: number }
	| { status: 'cancelled' };

export type DispatchResult =
	| { status: 'done'; action: 'none' | 'restarted' }
	| { status: 'unknown-type'; type: string }
	| { status: 'restart-failed'; detail: string }
	| { status: 'timed-out'; timeoutMs: number }
	| { status: 'cancelled' };

// ─── Reconciliation Outcome ──────────────────────────────────────────────────

export type ReconciliationOutcome =
	| { status: 'no-change' }
	| { status: 'updated'; built: boolean; dispatch: DispatchResult }
	| { status: 'path-missing'; path: string }
	| { status: 'sync-failed'; detail: string }
	| { status: 'build-failed'; exitCode: number | null; detail?: string; dispatch: DispatchResult }
	| { status: 'dispatch-failed'; built: boolean; dispatch: DispatchResult }
	| { status: 'timed-out'; stage: Stage; timeoutMs: number; dispatch?: DispatchResult }
	| { status: 'cancelled'; stage: Stage };

export type OutcomeStatus = ReconciliationOutcome['status'];

/**
 * True for outcomes an operator should treat as success.
 */
export function isSuccessfulOutcome(outcome: ReconciliationOutcome): boolean {
	return outcome.status === 'no-change' || outcome.status === 'updated';
}

export interface PassReport {
	project: ProjectDefinition;
	outcome: ReconciliationOutcome;
	durationMs: number;
}

/** Steps of a reconciliation as they happen, for the operator stream */
export type ProgressEvent =
	| { step: 'checking' }
	| { step: 'pulled'; output: string }
	| { step: 'building' }
	| { step: 'restarting' };

export type ProgressListener = (project: ProjectDefinition, event: ProgressEvent) => void;
