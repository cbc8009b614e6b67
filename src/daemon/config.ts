// ─── Config Loading & Validation ─────────────────────────────────────────────

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ErrorCode, UpdatectlError } from '../core/errors';
import type { ProjectDefinition } from '../core/types';
import { LOG_LEVEL_NAMES } from './log';
import type { LogLevel } from './log';

export const CONFIG_ENV_VAR = 'UPDATECTL_CONFIG';

export const DEFAULT_CONFIG_YAML = `intervalMinutes: 10
projects:
  - name: example
    path: /srv/example
    repo: https://github.com/user/example.git
    type: docker
    buildCommand: docker compose up -d --build
`;

export function expandHome(p: string): string {
	if (p === '~' || p.startsWith('~/')) {
		return path.join(os.homedir(), p.slice(1));
	}
	return p;
}

const optionalText = z.string().nullish().transform(v => v ?? '');

const ProjectSchema = z.object({
	name: z.string().trim().min(1, 'name must not be empty'),
	path: z.string().min(1, 'path must not be empty').transform(expandHome),
	repo: optionalText,
	type: z.string().min(1, 'type must not be empty'),
	buildCommand: optionalText,
});

const LogLevelSchema = z.custom<LogLevel>(
	(value) => typeof value === 'string' && LOG_LEVEL_NAMES.some(level => level === value),
	{ message: `logLevel must be one of: ${LOG_LEVEL_NAMES.join(', ')}` }
);

export const ConfigSchema = z.object({
	intervalMinutes: z.number().int().positive('intervalMinutes must be a positive integer').default(10),
	syncTimeoutSeconds: z.number().int().nonnegative().default(300),
	buildTimeoutMinutes: z.number().int().nonnegative().default(60),
	restartTimeoutSeconds: z.number().int().nonnegative().default(60),
	logLevel: LogLevelSchema.default('info'),
	logFile: z.string().min(1).transform(expandHome).optional(),
	logMaxSizeMB: z.number().positive('logMaxSizeMB must be positive').default(50),
	logMaxBackups: z.number().int().nonnegative().default(5),
	projects: z.array(ProjectSchema).nullish().transform(p => p ?? []),
}).superRefine((config, ctx) => {
	const seen = new Set<string>();
	config.projects.forEach((project, index) => {
		if (seen.has(project.name)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `duplicate project name "${project.name}"`,
				path: ['projects', index, 'name'],
			});
		}
		seen.add(project.name);
	});
});

export type UpdatectlConfig = z.infer<typeof ConfigSchema>;

/**
 * /etc/updatectl/updatectl.yaml, or %USERPROFILE%\updatectl\updatectl.yaml on Windows
 */
export function defaultConfigPath(platform: NodeJS.Platform = process.platform, env: NodeJS.ProcessEnv = process.env): string {
	if (platform === 'win32') {
		const home = env.USERPROFILE || os.homedir();
		return path.win32.join(home, 'updatectl', 'updatectl.yaml');
	}
	return '/etc/updatectl/updatectl.yaml';
}

export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
	return explicit || env[CONFIG_ENV_VAR] || defaultConfigPath(process.platform, env);
}

/**
 * Validate already-parsed config data. Returns one message per problem.
 */
export function validateConfig(raw: unknown): { config?: UpdatectlConfig; errors: string[] } {
	const parsed = ConfigSchema.safeParse(raw ?? {});
	if (parsed.success) {
		return { config: parsed.data, errors: [] };
	}
	const errors = parsed.error.issues.map(issue =>
		issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
	);
	return { errors };
}

export function parseConfig(content: string, source = '<inline>'): UpdatectlConfig {
	let raw: unknown;
	try {
		raw = parseYaml(content);
	} catch (error) {
		const detail = error instanceof YAMLParseError ? error.message : String(error);
		throw new UpdatectlError(ErrorCode.CONFIG_INVALID, `Failed to parse config ${source}: ${detail}`, { source });
	}

	const { config, errors } = validateConfig(raw);
	if (!config) {
		throw new UpdatectlError(
			ErrorCode.CONFIG_INVALID,
			`Configuration validation failed (${source}):\n${errors.join('\n')}`,
			{ source, errors }
		);
	}
	return config;
}

/**
 * Load and validate the config file. Any problem here is fatal to the caller.
 */
export function loadConfig(configPath: string): UpdatectlConfig {
	let content: string;
	try {
		content = fs.readFileSync(configPath, 'utf-8');
	} catch (error) {
		throw new UpdatectlError(
			ErrorCode.CONFIG_NOT_FOUND,
			`Failed to read config: ${error instanceof Error ? error.message : String(error)}`,
			{ configPath }
		);
	}
	return parseConfig(content, configPath);
}

/**
 * Write the starter config unless one exists. Returns true when created.
 */
export function writeDefaultConfig(configPath: string): boolean {
	if (fs.existsSync(configPath)) {
		return false;
	}
	fs.mkdirSync(path.dirname(configPath), { recursive: true });
	fs.writeFileSync(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
	return true;
}

/**
 * Last entry wins when a name repeats.
 */
export function findProject(config: UpdatectlConfig, name: string): ProjectDefinition {
	const project = [...config.projects].reverse().find(p => p.name === name);
	if (!project) {
		throw new UpdatectlError(ErrorCode.PROJECT_NOT_FOUND, `Project ${name} not found in configuration`, { name });
	}
	return project;
}

export interface ProcessTimeouts {
	syncMs: number;
	buildMs: number;
	restartMs: number;
}

export function processTimeouts(config: UpdatectlConfig): ProcessTimeouts {
	return {
		syncMs: config.syncTimeoutSeconds * 1000,
		buildMs: config.buildTimeoutMinutes * 60_000,
		restartMs: config.restartTimeoutSeconds * 1000,
	};
}
