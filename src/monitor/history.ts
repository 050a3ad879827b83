/**
 * Rolling history - the last N samples as four index-aligned series
 */

import { RingBuffer } from './ringBuffer';
import type { HistorySnapshot, MetricSample } from './types';

export const HISTORY_CAPACITY = 20;

export function isValidPercent(value: number): boolean {
    return Number.isFinite(value) && value >= 0 && value <= 100;
}

/**
 * Single writer (the tick path), any number of readers.
 * `record` runs synchronously, so a reader sees either all four appends or none.
 */
export class RollingHistoryStore {
    private readonly ram: RingBuffer<number>;
    private readonly cpu: RingBuffer<number>;
    private readonly disk: RingBuffer<number>;
    private readonly time: RingBuffer<string>;

    constructor(readonly capacity: number = HISTORY_CAPACITY) {
        this.ram = new RingBuffer(capacity);
        this.cpu = new RingBuffer(capacity);
        this.disk = new RingBuffer(capacity);
        this.time = new RingBuffer(capacity);
    }

    record(sample: MetricSample): void {
        for (const [name, value] of [['ram', sample.ramPct], ['cpu', sample.cpuPct], ['disk', sample.diskPct]] as const) {
            if (!isValidPercent(value)) {
                throw new RangeError(`${name} percentage out of range: ${value}`);
            }
        }

        this.ram.push(sample.ramPct);
        this.cpu.push(sample.cpuPct);
        this.disk.push(sample.diskPct);
        this.time.push(sample.timestamp);
    }

    snapshot(): HistorySnapshot {
        return Object.freeze({
            ram: Object.freeze(this.ram.toArray()),
            cpu: Object.freeze(this.cpu.toArray()),
            disk: Object.freeze(this.disk.toArray()),
            time: Object.freeze(this.time.toArray())
        });
    }

    get size(): number {
        return this.time.length;
    }

    latest(): MetricSample | null {
        const ramPct = this.ram.last();
        const cpuPct = this.cpu.last();
        const diskPct = this.disk.last();
        const timestamp = this.time.last();
        if (ramPct === undefined || cpuPct === undefined || diskPct === undefined || timestamp === undefined) {
            return null;
        }
        return { ramPct, cpuPct, diskPct, timestamp };
    }
}
