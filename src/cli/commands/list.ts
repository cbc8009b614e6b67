import type { Command } from 'commander';
import type { CliContext } from '../util/context';
import { output, error, errorMessage } from '../util/output';
import { formatTable, truncate } from '../formatters/table';
import { colorize, colors } from '../formatters/icons';

export function registerListCommand(program: Command, ctx: CliContext): void {
    program
        .command('list')
        .description('List configured projects')
        .option('--json', 'Output JSON')
        .action((options: { json?: boolean }) => {
            try {
                const { projects } = ctx.loadConfig();

                if (options.json) {
                    output(projects, { json: true });
                    return;
                }

                if (projects.length === 0) {
                    output(colorize('No projects configured.', colors.dim));
                    return;
                }

                output(formatTable(projects, [
                    { key: 'name', title: 'Name' },
                    { key: 'type', title: 'Type' },
                    { key: 'path', title: 'Path' },
                    {
                        key: 'buildCommand',
                        title: 'Build',
                        formatter: (v) => v ? truncate(v, 40) : '-'
                    }
                ]));
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
