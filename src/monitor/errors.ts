/**
 * Sampling errors. A failed sample never reaches the history store.
 */

export type SampledMetric = 'memory' | 'cpu' | 'disk' | 'timeout';

export class SamplingError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SamplingError';
    }
}

export class ProviderFetchError extends SamplingError {
    readonly metric: SampledMetric;

    constructor(metric: SampledMetric, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ProviderFetchError';
        this.metric = metric;
    }
}
