// ─── Fake Process Runner ─────────────────────────────────────────────────────

import type { ProcessResult, ProcessRunner, RunOptions } from '../../core/processRunner';

export interface RunCall {
	command: string;
	args: readonly string[];
	options: RunOptions;
}

type Responder = ProcessResult | ((call: RunCall) => ProcessResult | Promise<ProcessResult>);

export function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
	return {
		exitCode: 0,
		signal: null,
		output: '',
		timedOut: false,
		aborted: false,
		...overrides,
	};
}

/**
 * Records every invocation and answers per executable name.
 * Unconfigured executables exit 0 with no output.
 */
export class FakeRunner implements ProcessRunner {
	readonly calls: RunCall[] = [];
	private responders = new Map<string, Responder>();

	respond(command: string, responder: Responder): this {
		this.responders.set(command, responder);
		return this;
	}

	callsTo(command: string): RunCall[] {
		return this.calls.filter(c => c.command === command);
	}

	async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
		const call: RunCall = { command, args, options };
		this.calls.push(call);

		const responder = this.responders.get(command);
		if (responder === undefined) {
			return processResult();
		}
		return typeof responder === 'function' ? responder(call) : responder;
	}
}

export const UP_TO_DATE = processResult({ output: 'Already up to date.\n' });

export const FAST_FORWARD = processResult({
	output: 'Updating 1a2b3c4..5d6e7f8\nFast-forward\n src/index.ts | 2 +-\n 1 file changed, 1 insertion(+), 1 deletion(-)\n',
});
