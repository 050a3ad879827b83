/**
 * Stats Sampler - one validated MetricSample per call
 */

import { formatClock } from './clock';
import { ProviderFetchError, SamplingError } from './errors';
import type { SampledMetric } from './errors';
import { isValidPercent } from './history';
import { createLogger } from './logger';
import type { MetricSample, SystemStatsProvider } from './types';

export type SampleResult =
    | { ok: true; sample: MetricSample }
    | { ok: false; error: SamplingError };

export interface SamplerOptions {
    cpuWindowMs: number;
    diskPath: string;
    sampleTimeoutMs: number;
    now?: () => Date;
}

// One line per sample(), even when readings repeat
const logger = createLogger('Sampler', { dedupe: false });

function roundPercent(value: number): number {
    return Math.round(value * 10) / 10;
}

export class StatsSampler {
    private readonly now: () => Date;

    constructor(
        private readonly provider: SystemStatsProvider,
        private readonly options: SamplerOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Never rejects. The timestamp is taken before the CPU window opens,
     * so it marks the start of the measured interval.
     */
    async sample(): Promise<SampleResult> {
        const timestamp = formatClock(this.now());

        try {
            const readings = await this.withTimeout(this.readAll());
            const sample: MetricSample = { ...readings, timestamp };
            logger.log(`Fetched data: RAM ${sample.ramPct}%, CPU ${sample.cpuPct}%, Disk ${sample.diskPct}%`);
            return { ok: true, sample };
        } catch (error) {
            const samplingError = error instanceof SamplingError
                ? error
                : new SamplingError('Unexpected sampling failure', { cause: error });
            logger.error('Error fetching system stats:', samplingError.message);
            return { ok: false, error: samplingError };
        }
    }

    private async readAll(): Promise<Omit<MetricSample, 'timestamp'>> {
        const ramPct = await this.read('memory', () => this.provider.memoryPercent());
        const cpuPct = await this.read('cpu', () => this.provider.cpuPercent(this.options.cpuWindowMs));
        const diskPct = await this.read('disk', () => this.provider.diskPercent(this.options.diskPath));
        return { ramPct, cpuPct, diskPct };
    }

    private async read(metric: SampledMetric, fetch: () => Promise<number>): Promise<number> {
        let value: number;
        try {
            value = await fetch();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ProviderFetchError(metric, `${metric} read failed: ${reason}`, error);
        }

        if (typeof value !== 'number' || !isValidPercent(value)) {
            throw new ProviderFetchError(metric, `${metric} reading out of range: ${value}`);
        }
        return roundPercent(value);
    }

    private withTimeout<T>(work: Promise<T>): Promise<T> {
        const limit = this.options.sampleTimeoutMs;
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => {
                reject(new ProviderFetchError('timeout', `sampling exceeded ${limit}ms`));
            }, limit);
        });

        return Promise.race([work, timeout]).finally(() => {
            clearTimeout(timer);
        });
    }
}
