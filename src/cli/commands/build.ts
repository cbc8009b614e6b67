import type { Command } from 'commander';
import type { BuildResult } from '../../core/types';
import { findProject } from '../../daemon/config';
import type { CliContext } from '../util/context';
import { output, error, errorMessage } from '../util/output';

export function describeBuildFailure(result: Exclude<BuildResult, { status: 'success' }>): string {
    switch (result.status) {
        case 'failed':
            return result.exitCode !== null
                ? `exit status ${result.exitCode}`
                : result.detail ?? 'no exit status';
        case 'timed-out':
            return `timed out after ${Math.round(result.timeoutMs / 1000)}s`;
        case 'cancelled':
            return 'cancelled';
    }
}

export function registerBuildCommand(program: Command, ctx: CliContext): void {
    program
        .command('build')
        .description('Run build command for a specific project')
        .argument('<project-name>', 'Project name from the configuration')
        .action(async (projectName: string) => {
            try {
                const config = ctx.loadConfig();
                const project = findProject(config, projectName);

                if (!project.buildCommand) {
                    output(`No build command configured for project ${projectName}`);
                    return;
                }

                output(`Building project ${projectName}...`);
                const build = await ctx.createDaemon(config).build(projectName);
                if (build.skipped) {
                    return;
                }

                if (build.result.status === 'success') {
                    output(`Build completed for ${projectName}`);
                } else {
                    error(`Build failed for ${projectName}: ${describeBuildFailure(build.result)}`);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
