import type { Command } from 'commander';
import { formatProgress } from '../../core/status';
import { isSuccessfulOutcome } from '../../core/types';
import type { CliContext } from '../util/context';
import { output, error, errorMessage } from '../util/output';
import { formatReport } from '../formatters/report';

export function registerUpdateCommand(program: Command, ctx: CliContext): void {
    program
        .command('update')
        .description('Pull, build and redeploy a single project now')
        .argument('<project-name>', 'Project name from the configuration')
        .action(async (projectName: string) => {
            try {
                const daemon = ctx.createDaemon(ctx.loadConfig(), {
                    onProgress: (project, event) => output(formatProgress(project.name, event)),
                });
                const report = await daemon.update(projectName);
                const line = formatReport(report);

                if (isSuccessfulOutcome(report.outcome)) {
                    output(line);
                } else {
                    error(line);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
