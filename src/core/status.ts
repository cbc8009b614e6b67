// ─── Status Lines ────────────────────────────────────────────────────────────

import type { DispatchResult, ProgressEvent, ReconciliationOutcome, Stage } from './types';

const STAGE_LABELS: Record<Stage, string> = {
	sync: 'Git pull',
	build: 'Build',
	dispatch: 'Dispatch',
};

function firstLine(text: string): string {
	const line = text.split('\n').map(l => l.trim()).find(l => l.length > 0);
	return line ?? text.trim();
}

function seconds(ms: number): number {
	return Math.round(ms / 1000);
}

function describeDispatchFailure(projectName: string, dispatch: DispatchResult): string {
	switch (dispatch.status) {
		case 'unknown-type':
			return `Unknown type for ${projectName}: ${dispatch.type}`;
		case 'restart-failed':
			return `PM2 restart failed for ${projectName}: ${firstLine(dispatch.detail)}`;
		case 'timed-out':
			return `${STAGE_LABELS.dispatch} timed out for ${projectName} after ${seconds(dispatch.timeoutMs)}s`;
		case 'cancelled':
			return `Cancelled ${projectName} during ${STAGE_LABELS.dispatch.toLowerCase()}`;
		case 'done':
			return `Dispatched ${projectName}`;
	}
}

/**
 * One human-readable line per outcome, as shown to the operator
 */
export function formatOutcome(projectName: string, outcome: ReconciliationOutcome): string {
	switch (outcome.status) {
		case 'no-change':
			return `No new commits for ${projectName}`;
		case 'updated': {
			const steps = [outcome.built ? 'built' : 'pulled'];
			if (outcome.dispatch.status === 'done' && outcome.dispatch.action === 'restarted') {
				steps.push('restarted PM2 process');
			}
			return `Updated ${projectName}: ${steps.join(', ')}`;
		}
		case 'path-missing':
			return `Path not found for ${projectName}: ${outcome.path}`;
		case 'sync-failed':
			return `Git pull failed for ${projectName}: ${firstLine(outcome.detail)}`;
		case 'build-failed': {
			const reason = outcome.exitCode !== null
				? `exit status ${outcome.exitCode}`
				: firstLine(outcome.detail ?? 'no exit status');
			return `Build failed for ${projectName}: ${reason}`;
		}
		case 'dispatch-failed':
			return describeDispatchFailure(projectName, outcome.dispatch);
		case 'timed-out':
			return `${STAGE_LABELS[outcome.stage]} timed out for ${projectName} after ${seconds(outcome.timeoutMs)}s`;
		case 'cancelled':
			return `Cancelled ${projectName} during ${STAGE_LABELS[outcome.stage].toLowerCase()}`;
	}
}

/**
 * Operator line for a progress step; undefined when there is nothing to show
 */
export function formatProgress(projectName: string, event: ProgressEvent): string | undefined {
	switch (event.step) {
		case 'checking':
			return `Checking ${projectName}`;
		case 'pulled': {
			const text = event.output.trimEnd();
			return text.length > 0 ? text : undefined;
		}
		case 'building':
			return `→ Running build command for ${projectName}`;
		case 'restarting':
			return `→ Restarting PM2 process: ${projectName}`;
	}
}
