/**
 * Shared monitor types
 */

export interface MetricSample {
    readonly ramPct: number;
    readonly cpuPct: number;
    readonly diskPct: number;
    /** Local wall-clock time, HH:MM:SS */
    readonly timestamp: string;
}

export interface HistorySnapshot {
    readonly ram: readonly number[];
    readonly cpu: readonly number[];
    readonly disk: readonly number[];
    readonly time: readonly string[];
}

export interface ChartSeries {
    name: string;
    x: string[];
    y: number[];
}

export interface ChartPayload {
    title: string;
    series: ChartSeries[];
    xAxisLabel: 'Time';
    yAxisLabel: 'Percentage';
    xTickFormat: 'HH:MM:SS';
}

/** `one` renders a single combined chart, `multiple` one chart per metric */
export type PresentationMode = 'one' | 'multiple';

export type UiKind = 'web' | 'terminal';

export interface SystemStatsProvider {
    memoryPercent(): Promise<number>;
    /** Averages CPU utilization over `intervalMs`, resolving once the window has elapsed */
    cpuPercent(intervalMs: number): Promise<number>;
    diskPercent(path: string): Promise<number>;
}
