/**
 * Merge Metrics
 *
 * In-process counters and a duration histogram in Prometheus text format.
 * The HTTP service exposes them on GET /metrics.
 *
 * Metrics:
 * - merge_runs_total (counter, by status: success/failed)
 * - merge_duration_seconds (histogram)
 * - merge_unmatched_placeholders_total (counter)
 * - merge_conversions_total (counter, by status)
 * - merge_uploads_total (counter, by status)
 * - merge_template_cache_hits_total / merge_template_cache_misses_total (counters)
 */

// ── Histogram bucket boundaries for merge duration (seconds) ────────

const MERGE_DURATION_BUCKETS = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60];

// ── Internal metric state ───────────────────────────────────────────

type Outcome = 'success' | 'failed';

interface HistogramState {
  bucketCounts: number[];
  sum: number;
  count: number;
}

function emptyHistogram(): HistogramState {
  return {
    bucketCounts: new Array<number>(MERGE_DURATION_BUCKETS.length).fill(0),
    sum: 0,
    count: 0,
  };
}

function emptyOutcomes(): Record<Outcome, number> {
  return { success: 0, failed: 0 };
}

const metrics = {
  runsTotal: emptyOutcomes(),
  conversionsTotal: emptyOutcomes(),
  uploadsTotal: emptyOutcomes(),
  unmatchedTotal: 0,
  templateCacheHits: 0,
  templateCacheMisses: 0,
  mergeDuration: emptyHistogram(),
};

// ── Public API for recording metrics ────────────────────────────────

export function incMergeRuns(status: Outcome): void {
  metrics.runsTotal[status] += 1;
}

export function incConversions(status: Outcome): void {
  metrics.conversionsTotal[status] += 1;
}

export function incUploads(status: Outcome): void {
  metrics.uploadsTotal[status] += 1;
}

export function addUnmatchedPlaceholders(count: number): void {
  metrics.unmatchedTotal += count;
}

export function incTemplateCacheHits(): void {
  metrics.templateCacheHits += 1;
}

export function incTemplateCacheMisses(): void {
  metrics.templateCacheMisses += 1;
}

export function observeMergeDuration(durationSeconds: number): void {
  const histogram = metrics.mergeDuration;
  histogram.sum += durationSeconds;
  histogram.count += 1;

  for (let i = 0; i < MERGE_DURATION_BUCKETS.length; i++) {
    if (durationSeconds <= (MERGE_DURATION_BUCKETS[i] ?? Infinity)) {
      histogram.bucketCounts[i] = (histogram.bucketCounts[i] ?? 0) + 1;
      break;
    }
  }
}

// ── Prometheus text format serialization ────────────────────────────

function counterByStatus(lines: string[], name: string, help: string, values: Record<Outcome, number>): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} counter`);
  for (const [status, count] of Object.entries(values)) {
    lines.push(`${name}{status="${status}"} ${count}`);
  }
}

function counter(lines: string[], name: string, help: string, value: number): void {
  lines.push(`# HELP ${name} ${help}`);
  lines.push(`# TYPE ${name} counter`);
  lines.push(`${name} ${value}`);
}

export function serializeMetrics(): string {
  const lines: string[] = [];

  counterByStatus(lines, 'merge_runs_total', 'Total number of merges', metrics.runsTotal);

  lines.push('# HELP merge_duration_seconds Duration of a complete merge in seconds');
  lines.push('# TYPE merge_duration_seconds histogram');
  let cumulativeCount = 0;
  for (let i = 0; i < MERGE_DURATION_BUCKETS.length; i++) {
    cumulativeCount += metrics.mergeDuration.bucketCounts[i] ?? 0;
    lines.push(`merge_duration_seconds_bucket{le="${MERGE_DURATION_BUCKETS[i] ?? 0}"} ${cumulativeCount}`);
  }
  lines.push(`merge_duration_seconds_bucket{le="+Inf"} ${metrics.mergeDuration.count}`);
  lines.push(`merge_duration_seconds_sum ${metrics.mergeDuration.sum}`);
  lines.push(`merge_duration_seconds_count ${metrics.mergeDuration.count}`);

  counter(lines, 'merge_unmatched_placeholders_total', 'Placeholders left without a value', metrics.unmatchedTotal);
  counterByStatus(lines, 'merge_conversions_total', 'PDF conversions', metrics.conversionsTotal);
  counterByStatus(lines, 'merge_uploads_total', 'Uploads to object storage', metrics.uploadsTotal);
  counter(lines, 'merge_template_cache_hits_total', 'Template cache hits', metrics.templateCacheHits);
  counter(lines, 'merge_template_cache_misses_total', 'Template cache misses', metrics.templateCacheMisses);

  return lines.join('\n') + '\n';
}

/**
 * Reset all metrics to initial state.
 * Used in tests.
 */
export function resetMetrics(): void {
  metrics.runsTotal = emptyOutcomes();
  metrics.conversionsTotal = emptyOutcomes();
  metrics.uploadsTotal = emptyOutcomes();
  metrics.unmatchedTotal = 0;
  metrics.templateCacheHits = 0;
  metrics.templateCacheMisses = 0;
  metrics.mergeDuration = emptyHistogram();
}
