import { appendFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { existsSync } from 'fs';
import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLOR: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

let activeLevel: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const lower = value.toLowerCase();
  return isLogLevel(lower) ? lower : undefined;
}

export function setLogLevel(level: LogLevel) {
  activeLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Scoped logger. Everything goes to stderr: stdout is reserved for the MCP
 * stdio transport.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) return;
    const prefix = LEVEL_COLOR[level](`[${scope}]`);
    console.error(`${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}

let metricsDir = join(process.cwd(), '.agent', 'metrics');

export function setMetricsDir(dir: string) {
  metricsDir = dir;
}

export interface MetricTags {
  [key: string]: string | number | boolean;
}

/**
 * Log a structured metric to the daily ndjson file.
 * Never throws: a metric that cannot be written is reported on stderr and dropped.
 *
 * @param agent - The source of the metric (e.g. 'sandbox', 'publisher')
 * @param metric - The name of the metric (e.g. 'duration_ms')
 * @param tags - Optional key-value pairs for filtering/aggregation
 */
export async function logMetric(
  agent: string,
  metric: string,
  value: number,
  tags: MetricTags = {}
) {
  try {
    if (!existsSync(metricsDir)) {
      await mkdir(metricsDir, { recursive: true });
    }

    const date = new Date().toISOString().split('T')[0];
    const filename = join(metricsDir, `${date}.ndjson`);

    const entry = {
      timestamp: new Date().toISOString(),
      agent,
      metric,
      value,
      tags
    };

    await appendFile(filename, JSON.stringify(entry) + '\n');
  } catch (error) {
    console.error(`[Metrics] Failed to write metric ${metric}:`, error);
  }
}
