import os from "node:os";
import type { ResourceMonitor, ResourceSample } from "../../ports/ResourceMonitor";

export type CpuTimes = { idle: number; total: number };

export type OsSource = {
  cpus: () => Array<{ times: { user: number; nice: number; sys: number; idle: number; irq: number } }>;
  totalmem: () => number;
  freemem: () => number;
};

export const readCpuTimes = (source: Pick<OsSource, "cpus">): CpuTimes =>
  source.cpus().reduce<CpuTimes>(
    (acc, cpu) => {
      const { user, nice, sys, idle, irq } = cpu.times;
      return { idle: acc.idle + idle, total: acc.total + user + nice + sys + idle + irq };
    },
    { idle: 0, total: 0 }
  );

const clampPercent = (value: number): number => Math.min(100, Math.max(0, value));

/**
 * Host CPU and memory utilisation. CPU is measured over the interval since
 * the previous sample, so the first reading covers the time since construction.
 */
export class OsResourceMonitor implements ResourceMonitor {
  private previous: CpuTimes;

  constructor(private readonly source: OsSource = os) {
    this.previous = readCpuTimes(source);
  }

  sample(): ResourceSample {
    const current = readCpuTimes(this.source);
    const idleDelta = current.idle - this.previous.idle;
    const totalDelta = current.total - this.previous.total;
    this.previous = current;

    const cpuPercent = totalDelta > 0 ? clampPercent(100 * (1 - idleDelta / totalDelta)) : 0;
    const total = this.source.totalmem();
    const memoryPercent = total > 0 ? clampPercent(100 * (1 - this.source.freemem() / total)) : 0;
    return { cpuPercent, memoryPercent };
  }
}
