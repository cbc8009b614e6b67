// ─── Structured Logging ──────────────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
	ts: string;
	level: LogLevel;
	component: string;
	msg: string;
	data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export const DEFAULT_MAX_FILE_SIZE_BYTES = 50 * 1024 * 1024;
export const DEFAULT_MAX_BACKUPS = 5;

export interface LoggerOptions {
	level?: LogLevel;
	logFile?: string;
	/** Echo every entry to stderr */
	console?: boolean;
	maxFileSizeBytes?: number;
	maxBackups?: number;
}

/**
 * Logger - Structured JSON logging with rotation
 *
 * Entries are single JSON lines. They go to the log file when one is
 * configured and to stderr when console echo is on; stdout is left to the
 * operator status lines.
 */
export class Logger {
	private readonly level: LogLevel;
	private readonly logFile?: string;
	private readonly console: boolean;
	private readonly maxFileSizeBytes: number;
	private readonly maxBackups: number;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? 'info';
		this.logFile = options.logFile;
		this.console = options.console ?? false;
		this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
		this.maxBackups = options.maxBackups ?? DEFAULT_MAX_BACKUPS;

		if (this.logFile) {
			fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
		}
	}

	log(level: LogLevel, component: string, msg: string, data?: unknown): void {
		if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
			return;
		}

		const entry: LogEntry = {
			ts: new Date().toISOString(),
			level,
			component,
			msg,
		};

		if (data !== undefined) {
			entry.data = data;
		}

		const line = JSON.stringify(entry);

		if (this.console) {
			console.error(line);
		}

		if (this.logFile) {
			this.writeToFile(this.logFile, line);
		}
	}

	debug(component: string, msg: string, data?: unknown): void {
		this.log('debug', component, msg, data);
	}

	info(component: string, msg: string, data?: unknown): void {
		this.log('info', component, msg, data);
	}

	warn(component: string, msg: string, data?: unknown): void {
		this.log('warn', component, msg, data);
	}

	error(component: string, msg: string, data?: unknown): void {
		this.log('error', component, msg, data);
	}

	/**
	 * Rotates first when the file has reached its size limit. With no backups
	 * kept, a full file is simply started over.
	 */
	private writeToFile(file: string, line: string): void {
		try {
			if (fileSize(file) >= this.maxFileSizeBytes) {
				this.rotate(file);
			}
			fs.appendFileSync(file, `${line}\n`, 'utf-8');
		} catch (error) {
			console.error(`updatectl: cannot write log file ${file}: ${error instanceof Error ? error.message : String(error)}`);
			console.error(line);
		}
	}

	/**
	 * updatectl.log → updatectl.log.1 → … → updatectl.log.<maxBackups>, oldest dropped
	 */
	private rotate(file: string): void {
		const backup = (n: number): string => `${file}.${n}`;

		if (this.maxBackups === 0) {
			fs.rmSync(file, { force: true });
			return;
		}

		fs.rmSync(backup(this.maxBackups), { force: true });
		for (let n = this.maxBackups - 1; n >= 1; n--) {
			moveIfPresent(backup(n), backup(n + 1));
		}
		moveIfPresent(file, backup(1));
	}
}

function fileSize(file: string): number {
	return fs.existsSync(file) ? fs.statSync(file).size : 0;
}

function moveIfPresent(from: string, to: string): void {
	if (fs.existsSync(from)) {
		fs.renameSync(from, to);
	}
}
