/**
 * Benchmark result formatting utilities
 *
 * tinybench reports latencies in milliseconds; everything here is converted
 * to nanoseconds first.
 */

/**
 * The parts of a tinybench task result that are reported
 */
export interface LatencySummary {
  readonly mean: number;
  readonly p50?: number;
  readonly p99?: number;
  readonly sd: number;
  readonly moe: number;
  readonly samples: readonly number[];
}

export interface TaskSummary {
  readonly name: string;
  readonly result?: {
    readonly latency: LatencySummary;
    readonly throughput: { readonly mean: number };
    readonly error?: unknown;
  };
}

export interface FormattedResult {
  name: string;
  ops: number;
  mean: number;
  /**
   * Null when tinybench collected too few samples for the percentile
   */
  p50: number | null;
  p99: number | null;
  stdDev: number;
  margin: number;
  samples: number;
  cv: number; // coefficient of variation
}

const NS_PER_MS = 1_000_000;

function toNanoseconds(ms: number | undefined): number | null {
  return ms === undefined ? null : ms * NS_PER_MS;
}

/**
 * Format a single benchmark task result; null for tasks that did not run or
 * that threw
 */
export function formatTaskResult(task: TaskSummary): FormattedResult | null {
  const result = task.result;
  if (!result || result.error !== undefined) {
    return null;
  }

  const { latency } = result;
  const mean = latency.mean * NS_PER_MS;
  const stdDev = latency.sd * NS_PER_MS;

  return {
    name: task.name,
    ops: result.throughput.mean,
    mean,
    p50: toNanoseconds(latency.p50),
    p99: toNanoseconds(latency.p99),
    stdDev,
    margin: latency.moe * NS_PER_MS,
    samples: latency.samples.length,
    cv: mean > 0 ? stdDev / mean : 0,
  };
}

/**
 * Format all benchmark results, in task order
 */
export function formatBenchResults(tasks: readonly TaskSummary[]): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of tasks) {
    const formatted = formatTaskResult(task);
    if (formatted) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Pick a unit by magnitude
 *
 * @example
 * formatLatency(1_500); // '1.5μs'
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

export function formatPercentile(ns: number | null): string {
  return ns === null ? 'n/a' : formatLatency(ns);
}

export function stabilityLabel(cv: number): string {
  if (cv < 0.05) {
    return '🟢 Stable';
  }
  return cv < 0.1 ? '🟡 Moderate' : '🔴 High variance';
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P50', 'P99', 'Std Dev', 'Margin'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatPercentile(r.p50),
    formatPercentile(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
  ]);

  return [headers, separator, ...rows].map((row) => row.join(' | ')).join('\n');
}

/**
 * Per-scenario breakdown in markdown
 */
export function formatIndividualResults(results: readonly FormattedResult[]): string {
  const lines: string[] = ['## Individual Scenario Results', ''];

  for (const result of results) {
    lines.push(`### ${result.name}`);
    lines.push(`- **Ops/sec**: ${result.ops.toFixed(2)}`);
    lines.push(`- **Mean latency**: ${formatLatency(result.mean)}`);
    lines.push(`- **P99 latency**: ${formatPercentile(result.p99)}`);
    lines.push(
      `- **Samples**: ${result.samples.toString()} (CV: ${(result.cv * 100).toFixed(1)}%) ${stabilityLabel(result.cv)}`,
    );
    lines.push(`- **Standard deviation**: ±${formatLatency(result.stdDev)}`);
    lines.push('');
  }

  return lines.join('\n');
}
