/**
 * Terminal dashboard - the same chart payloads drawn with blessed-contrib
 */

import * as blessed from 'blessed';
import * as contrib from 'blessed-contrib';
import type { ChartRenderer } from './charts';
import { setLogSink } from './logger';
import type { LogLevel } from './logger';
import type { ChartPayload } from './types';

const SERIES_COLORS = ['yellow', 'cyan', 'magenta'];
const CHART_AREA = 70; // percent of the screen height, the rest is the log pane

export class UIManager {
    private screen: blessed.Widgets.Screen;
    private charts: contrib.Widgets.LineElement[] = [];
    private logsBox: blessed.Widgets.Log;

    constructor(renderer: ChartRenderer, onExit: () => void) {
        if (!process.stdout.isTTY) {
            throw new Error('Terminal dashboard requires a TTY');
        }

        this.screen = blessed.screen({
            smartCSR: true,
            title: renderer.heading
        });

        // Combined mode has one chart, separate mode one per metric
        const chartCount = renderer.mode === 'one' ? 1 : 3;
        const chartHeight = Math.floor(CHART_AREA / chartCount);
        for (let i = 0; i < chartCount; i++) {
            const line = contrib.line({
                top: `${i * chartHeight}%`,
                left: 0,
                width: '100%',
                height: `${chartHeight}%`,
                label: ' Loading... ',
                showLegend: chartCount === 1,
                legend: { width: 18 },
                style: { line: 'yellow', text: 'green', baseline: 'white' }
            });
            this.screen.append(line);
            this.charts.push(line);
        }

        this.logsBox = blessed.log({
            top: `${CHART_AREA}%`,
            left: 0,
            width: '100%',
            height: `${100 - CHART_AREA}%`,
            label: ' Logs ',
            border: { type: 'line' },
            scrollable: true
        });
        this.screen.append(this.logsBox);

        // Route log lines into the pane instead of the raw terminal
        setLogSink((level, line) => this.addLog(line, level));

        this.screen.key(['q', 'C-c', 'escape'], () => {
            onExit();
        });

        this.update(renderer.render({ ram: [], cpu: [], disk: [], time: [] }));
    }

    update(payloads: ChartPayload[]): void {
        payloads.forEach((payload, index) => {
            const line = this.charts[index];
            if (!line) return;

            line.setLabel(` ${payload.title} `);
            line.setData(payload.series.map((series, seriesIndex) => ({
                title: series.name,
                x: series.x,
                y: series.y,
                style: { line: SERIES_COLORS[seriesIndex % SERIES_COLORS.length] }
            })));
        });
        this.screen.render();
    }

    addLog(message: string, level: LogLevel = 'log'): void {
        this.logsBox.log(level === 'log' ? message : `${level.toUpperCase()} ${message}`);
        this.screen.render();
    }

    destroy(): void {
        setLogSink();
        this.screen.destroy();
    }
}
