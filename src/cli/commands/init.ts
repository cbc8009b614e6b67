import type { Command } from 'commander';
import { writeDefaultConfig } from '../../daemon/config';
import type { CliContext } from '../util/context';
import { output, error, errorMessage } from '../util/output';

export function registerInitCommand(program: Command, ctx: CliContext): void {
    program
        .command('init')
        .description('Write a starter updatectl configuration')
        .action(() => {
            try {
                const configPath = ctx.configPath();
                if (writeDefaultConfig(configPath)) {
                    output(`Created config at ${configPath}`);
                } else {
                    output(`Config already exists at ${configPath}`);
                }
            } catch (err) {
                error(errorMessage(err));
            }
        });
}
