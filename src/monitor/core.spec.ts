import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { SeparateChartRenderer } from "./charts";
import { MonitorCore, TICK_INTERVAL_MS } from "./core";
import { ProviderFetchError } from "./errors";
import { RollingHistoryStore } from "./history";
import { setLogSink } from "./logger";
import type { LogLevel } from "./logger";
import type { SampleResult } from "./sampler";
import type { MetricSample } from "./types";

const SAMPLE: MetricSample = { ramPct: 10, cpuPct: 5, diskPct: 50, timestamp: "00:00:00" };

const success = (sample: MetricSample = SAMPLE): SampleResult => ({ ok: true, sample });
const failure = (): SampleResult => ({
    ok: false,
    error: new ProviderFetchError("cpu", "cpu read failed: boom")
});

function setup(results: Array<() => SampleResult> = []) {
    const sampler = {
        sample: vi.fn(async (): Promise<SampleResult> => (results.shift() ?? success)())
    };
    const store = new RollingHistoryStore();
    const core = new MonitorCore({ sampler, store, renderer: new SeparateChartRenderer() });
    return { sampler, store, core };
}

describe("MonitorCore", () => {
    let lines: Array<{ level: LogLevel; line: string }>;

    beforeEach(() => {
        lines = [];
        setLogSink((level, line) => lines.push({ level, line }));
    });

    afterEach(() => {
        setLogSink();
        vi.useRealTimers();
    });

    it("ticks every five seconds", () => {
        expect(TICK_INTERVAL_MS).toBe(5000);
    });

    it("records a successful sample and renders the new history", async () => {
        const { core, store } = setup();
        const listener = vi.fn();
        core.onRender(listener);

        const result = await core.tick();

        expect(result?.recorded).toBe(true);
        expect(result?.sample).toEqual(SAMPLE);
        expect(store.snapshot()).toEqual({ ram: [10], cpu: [5], disk: [50], time: ["00:00:00"] });
        expect(result?.charts).toHaveLength(3);
        expect(result?.charts[0].series[0].y).toEqual([10]);
        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith(result?.charts, result);
        expect(core.getState()).toBe("idle");
    });

    it("leaves the history untouched when sampling fails", async () => {
        const { core, store } = setup([success, failure]);
        await core.tick();
        const before = JSON.stringify(store.snapshot());

        const result = await core.tick();

        expect(result?.recorded).toBe(false);
        expect(result?.sample).toBeNull();
        expect(JSON.stringify(store.snapshot())).toBe(before);
        expect(result?.charts[0].series[0].y).toEqual([10]);
    });

    it("renders empty charts when the first tick fails", async () => {
        const { core } = setup([failure]);
        const listener = vi.fn();
        core.onRender(listener);

        const result = await core.tick();

        expect(result?.charts.map(c => c.series[0].x)).toEqual([[], [], []]);
        expect(listener).toHaveBeenCalledTimes(1);
    });

    it("drops a tick that fires while the previous one is still updating", async () => {
        let release: (result: SampleResult) => void = () => undefined;
        const sampler = {
            sample: vi.fn(() => new Promise<SampleResult>((resolve) => {
                release = resolve;
            }))
        };
        const store = new RollingHistoryStore();
        const core = new MonitorCore({ sampler, store, renderer: new SeparateChartRenderer() });

        const first = core.tick();
        expect(core.getState()).toBe("updating");

        await expect(core.tick()).resolves.toBeNull();
        expect(sampler.sample).toHaveBeenCalledTimes(1);
        expect(core.getStats()).toEqual({ ticks: 1, dropped: 1 });
        expect(lines.some(l => l.level === "warn" && l.line.endsWith("[Monitor] Previous tick still running, skipping this one"))).toBe(true);

        release(success());
        const result = await first;
        expect(result?.recorded).toBe(true);
        expect(store.size).toBe(1);
        expect(core.getState()).toBe("idle");
    });

    it("keeps ticking when a render listener throws", async () => {
        const { core, store } = setup();
        const after = vi.fn();
        core.onRender(() => {
            throw new Error("socket gone");
        });
        core.onRender(after);

        const result = await core.tick();

        expect(result?.recorded).toBe(true);
        expect(after).toHaveBeenCalledTimes(1);
        expect(store.size).toBe(1);
        expect(lines.some(l => l.level === "error" && l.line.endsWith("[Monitor] Render listener failed: socket gone"))).toBe(true);
    });

    it("stops notifying a listener after it unsubscribes", async () => {
        const { core } = setup();
        const listener = vi.fn();
        const unsubscribe = core.onRender(listener);

        await core.tick();
        unsubscribe();
        await core.tick();

        expect(listener).toHaveBeenCalledTimes(1);
    });

    it("samples immediately on start and then on every interval until stopped", async () => {
        vi.useFakeTimers();
        const { core, sampler, store } = setup();

        core.start();
        expect(core.isRunning()).toBe(true);
        expect(sampler.sample).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(TICK_INTERVAL_MS);
        expect(sampler.sample).toHaveBeenCalledTimes(2);

        await vi.advanceTimersByTimeAsync(TICK_INTERVAL_MS * 3);
        expect(sampler.sample).toHaveBeenCalledTimes(5);
        expect(store.size).toBe(5);

        await core.stop();
        expect(core.isRunning()).toBe(false);
        await vi.advanceTimersByTimeAsync(TICK_INTERVAL_MS * 2);
        expect(sampler.sample).toHaveBeenCalledTimes(5);
    });

    it("ignores a second start", () => {
        vi.useFakeTimers();
        const { core, sampler } = setup();

        core.start();
        core.start();

        expect(sampler.sample).toHaveBeenCalledTimes(1);
        expect(lines.some(l => l.level === "warn" && l.line.endsWith("[Monitor] Already running"))).toBe(true);
    });

    it("waits for the in-flight tick when stopping", async () => {
        vi.useFakeTimers();
        let release: (result: SampleResult) => void = () => undefined;
        const sampler = {
            sample: vi.fn(() => new Promise<SampleResult>((resolve) => {
                release = resolve;
            }))
        };
        const store = new RollingHistoryStore();
        const core = new MonitorCore({ sampler, store, renderer: new SeparateChartRenderer() });

        core.start();
        const stopped = core.stop();
        release(success());
        await stopped;

        expect(store.size).toBe(1);
        expect(core.getState()).toBe("idle");
    });
});
