import type { Command } from 'commander';
import { loadConfig, resolveConfigPath } from '../../daemon/config';
import type { UpdatectlConfig } from '../../daemon/config';
import { UpdateDaemon } from '../../daemon/updateDaemon';
import type { UpdateDaemonOptions } from '../../daemon/updateDaemon';

export interface GlobalOptions {
    config?: string;
    verbose?: boolean;
}

export interface CliContext {
    configPath(): string;
    loadConfig(): UpdatectlConfig;
    createDaemon(config: UpdatectlConfig, options?: UpdateDaemonOptions): UpdateDaemon;
}

/**
 * Resolves the global --config/--verbose flags lazily, at action time
 */
export function createContext(program: Command): CliContext {
    const globals = (): GlobalOptions => program.opts<GlobalOptions>();

    return {
        configPath: () => resolveConfigPath(globals().config),
        loadConfig: () => loadConfig(resolveConfigPath(globals().config)),
        createDaemon: (config, options = {}) => new UpdateDaemon(config, {
            verbose: globals().verbose,
            ...options,
        }),
    };
}
