#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CONFIG_ENV_VAR } from '../daemon/config';
import { createContext } from './util/context';
import type { CliContext } from './util/context';
import { registerWatchCommand } from './commands/watch';
import { registerUpdateCommand } from './commands/update';
import { registerBuildCommand } from './commands/build';
import { registerListCommand } from './commands/list';
import { registerInitCommand } from './commands/init';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
    const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
    const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
}

/**
 * Build the updatectl program. Overrides replace parts of the command context.
 */
export function createProgram(overrides: Partial<CliContext> = {}): Command {
    const program = new Command();
    const ctx: CliContext = { ...createContext(program), ...overrides };

    program
        .name('updatectl')
        .description('Keep deployed projects in sync with their git upstream')
        .version(readVersion())
        .option('-c, --config <path>', `Config file (default: $${CONFIG_ENV_VAR} or the platform default)`)
        .option('-v, --verbose', 'Print structured log lines to stderr');

    registerWatchCommand(program, ctx);
    registerUpdateCommand(program, ctx);
    registerBuildCommand(program, ctx);
    registerListCommand(program, ctx);
    registerInitCommand(program, ctx);

    return program;
}

if (require.main === module) {
    const program = createProgram();

    // Show help if no command provided
    if (process.argv.length === 2) {
        program.help();
    }

    program.parseAsync(process.argv).catch((err: unknown) => {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    });
}
