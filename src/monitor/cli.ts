/**
 * Command line: host-stats [one|multiple] [--config <path>] [--ui web|terminal]
 */

import { createLogger } from './logger';
import type { UiKind } from './types';

export interface CliArgs {
    mode?: string;
    configPath?: string;
    ui?: UiKind;
}

const logger = createLogger('Cli');

export function parseArgs(args: string[]): CliArgs {
    const parsed: CliArgs = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--config' && i + 1 < args.length) {
            parsed.configPath = args[++i];
        } else if (arg === '--ui' && i + 1 < args.length) {
            const ui = args[++i];
            if (ui === 'web' || ui === 'terminal') {
                parsed.ui = ui;
            } else {
                logger.warn(`Unknown --ui value "${ui}", using the configured one`);
            }
        } else if (parsed.mode === undefined && !arg.startsWith('--')) {
            parsed.mode = arg;
        }
    }

    return parsed;
}
