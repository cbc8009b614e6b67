import type { Command } from 'commander';
import type { CliContext } from '../util/context';
import { output, error, errorMessage } from '../util/output';
import { formatProgress } from '../../core/status';
import { formatReport } from '../formatters/report';

export function registerWatchCommand(program: Command, ctx: CliContext): void {
    program
        .command('watch')
        .description('Run updatectl daemon to auto-update projects')
        .action(async () => {
            try {
                const config = ctx.loadConfig();
                const daemon = ctx.createDaemon(config, {
                    onProgress: (project, event) => output(formatProgress(project.name, event)),
                    onOutcome: (report) => output(formatReport(report)),
                });

                output(`Running updatectl every ${config.intervalMinutes} minutes...`);
                await daemon.watch();
                output('updatectl stopped');
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
