import { appendFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { existsSync } from 'fs';
import pc from 'picocolors';

let debugEnabled = process.env.DEBUG === 'true';

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebug(): boolean {
  return debugEnabled;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (debugEnabled) console.log(pc.dim(prefix), ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(pc.yellow(prefix), ...args),
    error: (...args) => console.error(pc.red(prefix), ...args),
  };
}

export interface MetricTags {
  [key: string]: string | number | boolean;
}

/**
 * Append a structured metric to the daily ndjson file in `metricsDir`.
 * Never throws; a failed write is reported on stderr.
 *
 * @param source - Where the metric comes from (e.g. 'queue')
 * @param metric - Metric name (e.g. 'retheme_latency_ms')
 */
export async function logMetric(
  metricsDir: string,
  source: string,
  metric: string,
  value: number,
  tags: MetricTags = {}
): Promise<void> {
  try {
    if (!existsSync(metricsDir)) {
      await mkdir(metricsDir, { recursive: true });
    }

    const now = new Date();
    const date = now.toISOString().split('T')[0];
    const filename = join(metricsDir, `${date}.ndjson`);

    const entry = {
      timestamp: now.toISOString(),
      source,
      metric,
      value,
      tags
    };

    await appendFile(filename, JSON.stringify(entry) + '\n');
  } catch (error) {
    console.error(`[Metrics] Failed to write metric ${metric}:`, error);
  }
}
