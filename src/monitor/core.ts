/**
 * Monitor Core - drives the sample -> record -> render cycle on a fixed timer
 */

import type { ChartRenderer } from './charts';
import type { RollingHistoryStore } from './history';
import { createLogger } from './logger';
import type { StatsSampler } from './sampler';
import type { ChartPayload, MetricSample } from './types';

export const TICK_INTERVAL_MS = 5000;

export type TickState = 'idle' | 'updating';

export interface TickResult {
    recorded: boolean;
    sample: MetricSample | null;
    charts: ChartPayload[];
}

export type RenderListener = (charts: ChartPayload[], result: TickResult) => void;

export interface MonitorCoreOptions {
    sampler: Pick<StatsSampler, 'sample'>;
    store: RollingHistoryStore;
    renderer: ChartRenderer;
    /** Only overridden by tests; production always ticks every 5s */
    intervalMs?: number;
}

const logger = createLogger('Monitor');

export class MonitorCore {
    private readonly sampler: Pick<StatsSampler, 'sample'>;
    private readonly store: RollingHistoryStore;
    private readonly renderer: ChartRenderer;
    private readonly intervalMs: number;
    private readonly listeners = new Set<RenderListener>();

    private state: TickState = 'idle';
    private inFlight: Promise<TickResult> | null = null;
    private updateInterval: NodeJS.Timeout | null = null;
    private tickCount = 0;
    private droppedTicks = 0;

    constructor(options: MonitorCoreOptions) {
        this.sampler = options.sampler;
        this.store = options.store;
        this.renderer = options.renderer;
        this.intervalMs = options.intervalMs ?? TICK_INTERVAL_MS;
    }

    start(): void {
        if (this.updateInterval) {
            logger.warn('Already running');
            return;
        }

        this.updateInterval = setInterval(() => {
            this.fire();
        }, this.intervalMs);
        this.fire();

        logger.log(`Started (${this.renderer.mode} mode, every ${this.intervalMs}ms)`);
    }

    async stop(): Promise<void> {
        if (!this.updateInterval) return;

        clearInterval(this.updateInterval);
        this.updateInterval = null;

        if (this.inFlight) {
            await this.inFlight;
        }
        logger.log('Stopped');
    }

    isRunning(): boolean {
        return this.updateInterval !== null;
    }

    getState(): TickState {
        return this.state;
    }

    getStats(): { ticks: number; dropped: number } {
        return { ticks: this.tickCount, dropped: this.droppedTicks };
    }

    onRender(listener: RenderListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /** Renders the current history without sampling */
    renderCurrent(): ChartPayload[] {
        return this.renderer.render(this.store.snapshot());
    }

    /**
     * Runs one update. Returns null when a previous tick is still updating;
     * the late tick is dropped rather than queued.
     */
    async tick(): Promise<TickResult | null> {
        if (this.state === 'updating') {
            this.droppedTicks++;
            logger.warn('Previous tick still running, skipping this one');
            return null;
        }

        this.state = 'updating';
        this.inFlight = this.update();
        try {
            return await this.inFlight;
        } finally {
            this.inFlight = null;
            this.state = 'idle';
        }
    }

    private fire(): void {
        this.tick().catch((error: unknown) => {
            logger.error('Error in update loop:', error);
        });
    }

    private async update(): Promise<TickResult> {
        this.tickCount++;
        const result = await this.sampler.sample();

        let sample: MetricSample | null = null;
        if (result.ok) {
            this.store.record(result.sample);
            sample = result.sample;
        } else {
            logger.log('No data fetched, history unchanged');
        }

        const charts = this.renderCurrent();
        const tickResult: TickResult = { recorded: sample !== null, sample, charts };
        this.notify(tickResult);
        return tickResult;
    }

    private notify(result: TickResult): void {
        for (const listener of this.listeners) {
            try {
                listener(result.charts, result);
            } catch (error) {
                logger.error('Render listener failed:', error);
            }
        }
    }
}
