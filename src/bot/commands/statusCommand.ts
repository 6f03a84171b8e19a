import os from 'node:os';

import type { ChatCommand } from './commandRegistry.js';
import type { Envelope } from './envelope.js';
import { formatDate, formatDuration, formatPercent } from './formatUtils.js';

export interface StatusSample {
  uptimeSeconds: number;
  loadAverage: number;
  cpuCount: number;
  memoryUsedRatio: number;
  now: Date;
}

function sampleHost(): StatusSample {
  const total = os.totalmem();
  return {
    uptimeSeconds: process.uptime(),
    loadAverage: os.loadavg()[0] ?? 0,
    cpuCount: os.cpus().length || 1,
    memoryUsedRatio: total > 0 ? (total - os.freemem()) / total : 0,
    now: new Date(),
  };
}

export function formatStatus(sample: StatusSample): string {
  const cpuRatio = Math.min(1, sample.loadAverage / sample.cpuCount);
  return [
    `Uptime: ${formatDuration(sample.uptimeSeconds * 1000)}`,
    `CPU load: ${formatPercent(cpuRatio)}`,
    `Memory: ${formatPercent(sample.memoryUsedRatio)}`,
    `Date: ${formatDate(sample.now)}`,
  ].join('\n');
}

export class StatusCommand implements ChatCommand {
  name = 'status';
  description = 'Show bot uptime, CPU load, memory use and today\'s date.';
  category = 'utility';

  constructor(private readonly sample: () => StatusSample = sampleHost) {}

  async execute(envelope: Envelope): Promise<void> {
    await envelope.send(formatStatus(this.sample()));
  }
}
