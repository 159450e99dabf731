/**
 * Structured logging for coordinator operations.
 *
 * Logs to stderr (the MCP transport owns stdout). withLogging() wraps an
 * operation to capture timing, failures and per-operation call metrics.
 */

// ─── Types ──────────────────────────────────────────────

export type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  operation?: string;
  duration_ms?: number;
  message: string;
  context?: Record<string, unknown>;
}

// ─── Logger ─────────────────────────────────────────────

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value) ?? String(value);
}

function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];

  if (entry.operation) {
    parts.push(`[${entry.operation}]`);
  }

  parts.push(entry.message);

  if (entry.duration_ms !== undefined) {
    parts.push(`(${entry.duration_ms}ms)`);
  }

  if (entry.context) {
    for (const [key, value] of Object.entries(entry.context)) {
      if (value === undefined) continue;
      parts.push(`${key}=${formatValue(value)}`);
    }
  }

  return parts.join(" ");
}

export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  console.error(
    formatEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    })
  );
}

export function logOperation(
  operation: string,
  level: LogLevel,
  message: string,
  duration_ms?: number,
  context?: Record<string, unknown>
): void {
  console.error(
    formatEntry({
      timestamp: new Date().toISOString(),
      level,
      operation,
      duration_ms,
      message,
      context,
    })
  );
}

// ─── Operation Metrics ──────────────────────────────────

interface OperationMetrics {
  calls: number;
  errors: number;
  totalMs: number;
  lastCallAt: string | null;
}

const metrics = new Map<string, OperationMetrics>();

export function recordCall(
  operation: string,
  durationMs: number,
  isError: boolean
): void {
  const existing = metrics.get(operation) ?? {
    calls: 0,
    errors: 0,
    totalMs: 0,
    lastCallAt: null,
  };

  existing.calls++;
  if (isError) existing.errors++;
  existing.totalMs += durationMs;
  existing.lastCallAt = new Date().toISOString();

  metrics.set(operation, existing);
}

export function getOperationMetrics(): Record<
  string,
  OperationMetrics & { avgMs: number }
> {
  const result: Record<string, OperationMetrics & { avgMs: number }> = {};
  for (const [operation, m] of metrics) {
    result[operation] = {
      ...m,
      avgMs: m.calls > 0 ? Math.round(m.totalMs / m.calls) : 0,
    };
  }
  return result;
}

/** Slow-call threshold for withLogging warnings */
export const SLOW_OPERATION_MS = 1000;

/**
 * Run an operation with timing, metrics and error logging.
 * The result (or error) is passed through unchanged.
 */
export async function withLogging<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    const duration = Date.now() - start;
    recordCall(operation, duration, false);
    if (duration > SLOW_OPERATION_MS) {
      logOperation(operation, "warn", "slow execution", duration);
    }
    return result;
  } catch (error) {
    const duration = Date.now() - start;
    recordCall(operation, duration, true);
    logOperation(
      operation,
      "error",
      error instanceof Error ? error.message : String(error),
      duration
    );
    throw error;
  }
}
