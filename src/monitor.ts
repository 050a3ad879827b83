#!/usr/bin/env node
/**
 * Host Stats Monitor
 * Samples RAM, CPU and disk usage every 5 seconds and charts the last 20 samples.
 *
 * Usage: host-stats [one|multiple] [--config <path>] [--ui web|terminal]
 */

import 'dotenv/config';
import { createChartRenderer, parseMode } from './monitor/charts';
import { parseArgs } from './monitor/cli';
import { ConfigManager } from './monitor/config';
import { MonitorCore } from './monitor/core';
import { DashboardBridge } from './monitor/dashboard-bridge';
import { RollingHistoryStore } from './monitor/history';
import { createLogger } from './monitor/logger';
import { StatsSampler } from './monitor/sampler';
import { SystemCollector } from './monitor/collectors/systemCollector';
import { UIManager } from './monitor/ui';

const logger = createLogger('Monitor');

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));
    const config = new ConfigManager(args.configPath).getConfig();
    const ui = args.ui ?? config.ui;

    // Mode is fixed for the lifetime of the process
    const renderer = createChartRenderer(parseMode(args.mode));
    const store = new RollingHistoryStore();
    const sampler = new StatsSampler(new SystemCollector(), config.sampler);
    const core = new MonitorCore({ sampler, store, renderer });

    let stopping = false;
    let stopView: () => Promise<void> = async () => undefined;

    function shutdown(): void {
        if (stopping) return;
        stopping = true;
        logger.log('Shutting down...');
        core.stop()
            .then(() => stopView())
            .then(
                () => process.exit(0),
                (error: unknown) => {
                    logger.error('Shutdown failed:', error);
                    process.exit(1);
                }
            );
    }

    if (ui === 'terminal') {
        const terminal = new UIManager(renderer, shutdown);
        core.onRender((charts) => terminal.update(charts));
        stopView = async () => terminal.destroy();
    } else {
        const bridge = new DashboardBridge({ store, renderer });
        core.onRender((charts) => bridge.broadcastCharts(charts));
        await bridge.start(config.server.port, config.server.host);
        stopView = () => bridge.stop();
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    core.start();
}

// Run
main().catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exit(1);
});
