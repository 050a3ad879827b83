import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createLogger, setLogSink } from "./logger";
import type { LogLevel } from "./logger";
import { formatClock } from "./clock";

describe("formatClock", () => {
    it("zero-pads hours, minutes and seconds", () => {
        expect(formatClock(new Date(2024, 5, 1, 7, 3, 9))).toBe("07:03:09");
        expect(formatClock(new Date(2024, 5, 1, 23, 59, 0))).toBe("23:59:00");
    });
});

describe("MonitorLogger", () => {
    let lines: Array<{ level: LogLevel; line: string }>;

    beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date(2024, 5, 1, 14, 2, 30));
        lines = [];
        setLogSink((level, line) => lines.push({ level, line }));
    });

    afterEach(() => {
        setLogSink();
        vi.useRealTimers();
    });

    it("prefixes the time and scope", () => {
        createLogger("Sampler").log("Fetched", { ram: 1 });

        expect(lines).toEqual([{ level: "log", line: '[14:02:30] [Sampler] Fetched {"ram":1}' }]);
    });

    it("writes errors by message", () => {
        createLogger("Monitor").error("Tick failed:", new Error("boom"));

        expect(lines).toEqual([{ level: "error", line: "[14:02:30] [Monitor] Tick failed: boom" }]);
    });

    it("drops a repeat of the previous message", () => {
        const logger = createLogger("Monitor");
        logger.warn("slow tick");
        logger.warn("slow tick");
        logger.log("ok");
        logger.warn("slow tick");

        expect(lines.map(l => l.line)).toEqual([
            "[14:02:30] [Monitor] slow tick",
            "[14:02:30] [Monitor] ok",
            "[14:02:30] [Monitor] slow tick"
        ]);
    });

    it("treats the same text from another scope as new", () => {
        createLogger("A").log("hello");
        createLogger("B").log("hello");

        expect(lines).toHaveLength(2);
    });

    it("remembers the previous message per logger", () => {
        const sampler = createLogger("Sampler");
        const monitor = createLogger("Monitor");

        sampler.log("steady");
        monitor.log("tick");
        sampler.log("steady");

        expect(lines.map(l => l.line)).toEqual([
            "[14:02:30] [Sampler] steady",
            "[14:02:30] [Monitor] tick"
        ]);
    });

    it("keeps every repeat when dedupe is off", () => {
        const logger = createLogger("Sampler", { dedupe: false });
        logger.log("same");
        logger.log("same");

        expect(lines).toHaveLength(2);
    });

    it("starts fresh after the sink is swapped", () => {
        const logger = createLogger("Monitor");
        logger.log("ready");
        const second: string[] = [];
        setLogSink((_level, line) => second.push(line));

        logger.log("ready");

        expect(lines).toHaveLength(1);
        expect(second).toEqual(["[14:02:30] [Monitor] ready"]);
    });

    it("writes to the console by default", () => {
        setLogSink();
        const spy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

        createLogger("Cli").warn("careful");

        expect(spy).toHaveBeenCalledWith("[14:02:30] [Cli] careful");
        spy.mockRestore();
    });
});
