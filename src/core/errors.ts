// ─── Errors ──────────────────────────────────────────────────────────────────

/**
 * Failures outside the reconciliation core. Per-project problems never
 * become exceptions; they are reconciliation outcomes.
 */
export enum ErrorCode {
	CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
	CONFIG_INVALID = 'CONFIG_INVALID',
	PROJECT_NOT_FOUND = 'PROJECT_NOT_FOUND',
}

export class UpdatectlError extends Error {
	public readonly code: ErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
		super(message);
		this.name = 'UpdatectlError';
		this.code = code;
		this.context = context;
	}
}

export function isUpdatectlError(error: unknown): error is UpdatectlError {
	return error instanceof UpdatectlError;
}
