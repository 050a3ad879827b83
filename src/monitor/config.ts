/**
 * Config Manager - defaults, optional JSON file, environment overrides
 */

import * as fs from 'fs';
import * as path from 'path';
import { TICK_INTERVAL_MS } from './core';
import { createLogger } from './logger';
import type { UiKind } from './types';

export interface MonitorConfig {
    server: {
        host: string;
        port: number;
    };
    sampler: {
        cpuWindowMs: number;
        diskPath: string;
        sampleTimeoutMs: number;
    };
    ui: UiKind;
}

export const DEFAULT_CONFIG_FILE = 'host-stats.config.json';

const logger = createLogger('Config');

export function getDefaultConfig(): MonitorConfig {
    return {
        server: {
            host: '0.0.0.0',
            port: 8050
        },
        sampler: {
            cpuWindowMs: 1000,
            diskPath: '/',
            sampleTimeoutMs: 4000
        },
        ui: 'web'
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(value: unknown, fallback: number, min: number): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    return typeof parsed === 'number' && Number.isInteger(parsed) && parsed >= min ? parsed : fallback;
}

function pickString(value: unknown, fallback: string): string {
    return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickUi(value: unknown, fallback: UiKind): UiKind {
    return value === 'web' || value === 'terminal' ? value : fallback;
}

export class ConfigManager {
    private config: MonitorConfig;
    private configPath: string;

    constructor(configPath?: string, private readonly env: NodeJS.ProcessEnv = process.env) {
        this.configPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);
        this.config = this.checkTiming(this.applyEnv(this.loadConfig()));
    }

    getConfig(): MonitorConfig {
        return this.config;
    }

    getConfigPath(): string {
        return this.configPath;
    }

    private loadConfig(): MonitorConfig {
        const defaults = getDefaultConfig();
        if (!fs.existsSync(this.configPath)) {
            return defaults;
        }

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
            return this.merge(defaults, raw);
        } catch (error) {
            logger.error(`Failed to load config from ${this.configPath}:`, error);
            return defaults;
        }
    }

    private merge(defaults: MonitorConfig, raw: unknown): MonitorConfig {
        if (!isRecord(raw)) {
            logger.warn(`Ignoring ${this.configPath}: expected a JSON object`);
            return defaults;
        }
        const server: Record<string, unknown> = isRecord(raw.server) ? raw.server : {};
        const sampler: Record<string, unknown> = isRecord(raw.sampler) ? raw.sampler : {};

        return {
            server: {
                host: pickString(server.host, defaults.server.host),
                port: pickNumber(server.port, defaults.server.port, 0)
            },
            sampler: {
                cpuWindowMs: pickNumber(sampler.cpuWindowMs, defaults.sampler.cpuWindowMs, 1),
                diskPath: pickString(sampler.diskPath, defaults.sampler.diskPath),
                sampleTimeoutMs: pickNumber(sampler.sampleTimeoutMs, defaults.sampler.sampleTimeoutMs, 1)
            },
            ui: pickUi(raw.ui, defaults.ui)
        };
    }

    /**
     * The CPU window has to fit inside the timeout, and the timeout inside one tick,
     * otherwise every sample fails or ticks overlap.
     */
    private checkTiming(config: MonitorConfig): MonitorConfig {
        const { cpuWindowMs, sampleTimeoutMs } = config.sampler;
        if (cpuWindowMs < sampleTimeoutMs && sampleTimeoutMs < TICK_INTERVAL_MS) {
            return config;
        }

        const defaults = getDefaultConfig().sampler;
        logger.warn(
            `Need cpuWindowMs < sampleTimeoutMs < ${TICK_INTERVAL_MS}, got ${cpuWindowMs} and ${sampleTimeoutMs}; ` +
            `using ${defaults.cpuWindowMs} and ${defaults.sampleTimeoutMs}`
        );
        return {
            ...config,
            sampler: {
                ...config.sampler,
                cpuWindowMs: defaults.cpuWindowMs,
                sampleTimeoutMs: defaults.sampleTimeoutMs
            }
        };
    }

    private applyEnv(config: MonitorConfig): MonitorConfig {
        return {
            server: {
                host: pickString(this.env.HOST, config.server.host),
                port: pickNumber(this.env.PORT, config.server.port, 0)
            },
            sampler: {
                ...config.sampler,
                diskPath: pickString(this.env.HOST_STATS_DISK_PATH, config.sampler.diskPath)
            },
            ui: pickUi(this.env.HOST_STATS_UI, config.ui)
        };
    }
}
