/**
 * System Collector - host memory, CPU and filesystem utilization
 */

import * as os from 'os';
import { promises as fs } from 'fs';
import type { StatsFs } from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import type { SystemStatsProvider } from '../types';

export interface CpuTimes {
    busy: number;
    total: number;
}

/** Sums the tick counters of every core */
export function readCpuTimes(cpus: os.CpuInfo[] = os.cpus()): CpuTimes {
    let busy = 0;
    let total = 0;
    for (const cpu of cpus) {
        const { user, nice, sys, irq, idle } = cpu.times;
        busy += user + nice + sys + irq;
        total += user + nice + sys + irq + idle;
    }
    return { busy, total };
}

export function cpuPercentBetween(before: CpuTimes, after: CpuTimes): number {
    const total = after.total - before.total;
    if (total <= 0) return 0;
    const busy = after.busy - before.busy;
    return Math.min(100, Math.max(0, (busy / total) * 100));
}

/** Used share of the space visible to unprivileged users, like `df` */
export function diskPercentFromStats(stats: Pick<StatsFs, 'blocks' | 'bfree' | 'bavail'>): number {
    const used = stats.blocks - stats.bfree;
    const usable = used + stats.bavail;
    if (usable <= 0) return 0;
    return (used / usable) * 100;
}

export class SystemCollector implements SystemStatsProvider {
    async memoryPercent(): Promise<number> {
        const totalMem = os.totalmem();
        const usedMem = totalMem - os.freemem();
        return (usedMem / totalMem) * 100;
    }

    async cpuPercent(intervalMs: number): Promise<number> {
        const before = readCpuTimes();
        await sleep(intervalMs);
        return cpuPercentBetween(before, readCpuTimes());
    }

    async diskPercent(path: string): Promise<number> {
        const stats = await fs.statfs(path);
        return diskPercentFromStats(stats);
    }
}
