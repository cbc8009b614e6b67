// ─── Source Synchronizer ─────────────────────────────────────────────────────

import * as fs from 'fs';
import { failureDetail } from './processRunner';
import type { ProcessRunner } from './processRunner';
import type { SyncResult } from './types';
import type { Logger } from '../daemon/log';

/** Markers git prints when a pull brought nothing new */
export const UP_TO_DATE_MARKERS: readonly string[] = [
	'Already up to date.',
	'Already up-to-date.',
];

/**
 * Whether a pull's output says nothing changed. Anything else, including
 * empty or unexpected output, counts as a change.
 */
export function looksUnchanged(output: string): boolean {
	return UP_TO_DATE_MARKERS.some(marker => output.includes(marker));
}

export interface SourceSyncOptions {
	/** Per-pull limit in milliseconds; 0 disables */
	timeoutMs?: number;
	git?: string;
}

/**
 * SourceSynchronizer - pulls the upstream revision into a working copy
 */
export class SourceSynchronizer {
	private timeoutMs: number;
	private git: string;

	constructor(
		private runner: ProcessRunner,
		private logger: Logger,
		options: SourceSyncOptions = {}
	) {
		this.timeoutMs = options.timeoutMs ?? 0;
		this.git = options.git ?? 'git';
	}

	async sync(workingCopy: string, signal?: AbortSignal): Promise<SyncResult> {
		if (!fs.existsSync(workingCopy)) {
			return { status: 'path-missing' };
		}

		const result = await this.runner.run(this.git, ['-C', workingCopy, 'pull'], {
			output: 'capture',
			timeoutMs: this.timeoutMs,
			signal,
		});

		if (result.aborted) {
			return { status: 'cancelled' };
		}
		if (result.timedOut) {
			return { status: 'timed-out', timeoutMs: this.timeoutMs };
		}
		if (result.error || result.exitCode !== 0) {
			return { status: 'failed', output: failureDetail(result) };
		}

		this.logger.debug('sync', `git pull in ${workingCopy}`, { output: result.output });

		return looksUnchanged(result.output)
			? { status: 'unchanged', output: result.output }
			: { status: 'changed', output: result.output };
	}
}
