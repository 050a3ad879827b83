/**
 * Chart renderers - shape a history snapshot into chart payloads.
 * The strategy is picked once at startup from the presentation mode.
 */

import type { ChartPayload, ChartSeries, HistorySnapshot, PresentationMode } from './types';

type MetricKey = 'ram' | 'cpu' | 'disk';

const METRICS: ReadonlyArray<{ key: MetricKey; seriesName: string; title: string }> = [
    { key: 'ram', seriesName: 'RAM Usage (%)', title: 'RAM Usage Over Time' },
    { key: 'cpu', seriesName: 'CPU Usage (%)', title: 'CPU Usage Over Time' },
    { key: 'disk', seriesName: 'Disk Usage (%)', title: 'Disk Usage Over Time' }
];

export interface ChartRenderer {
    readonly mode: PresentationMode;
    /** Dashboard page heading */
    readonly heading: string;
    render(snapshot: HistorySnapshot): ChartPayload[];
}

function toSeries(snapshot: HistorySnapshot, key: MetricKey, name: string): ChartSeries {
    return { name, x: [...snapshot.time], y: [...snapshot[key]] };
}

function chart(title: string, series: ChartSeries[]): ChartPayload {
    return {
        title,
        series,
        xAxisLabel: 'Time',
        yAxisLabel: 'Percentage',
        xTickFormat: 'HH:MM:SS'
    };
}

export class CombinedChartRenderer implements ChartRenderer {
    readonly mode = 'one';
    readonly heading = 'System Monitoring Dashboard (Combined Graph)';

    render(snapshot: HistorySnapshot): ChartPayload[] {
        const series = METRICS.map(({ key, seriesName }) => toSeries(snapshot, key, seriesName));
        return [chart('RAM, CPU, and Disk Usage Over Time', series)];
    }
}

export class SeparateChartRenderer implements ChartRenderer {
    readonly mode = 'multiple';
    readonly heading = 'System Monitoring Dashboard (Separate Graphs)';

    render(snapshot: HistorySnapshot): ChartPayload[] {
        return METRICS.map(({ key, seriesName, title }) => chart(title, [toSeries(snapshot, key, seriesName)]));
    }
}

/** `one` selects the combined chart; anything else falls back to `multiple` */
export function parseMode(value: string | undefined): PresentationMode {
    return value === 'one' ? 'one' : 'multiple';
}

export function createChartRenderer(mode: PresentationMode): ChartRenderer {
    return mode === 'one' ? new CombinedChartRenderer() : new SeparateChartRenderer();
}
