import { describe, it, expect, beforeEach } from 'vitest';
import {
  addUnmatchedPlaceholders,
  incConversions,
  incMergeRuns,
  incUploads,
  observeMergeDuration,
  resetMetrics,
  serializeMetrics,
} from '../metrics/merge-metrics';

describe('merge metrics', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('serializes counters by status', () => {
    incMergeRuns('success');
    incMergeRuns('success');
    incMergeRuns('failed');
    incConversions('failed');
    incUploads('success');
    addUnmatchedPlaceholders(3);

    const lines = serializeMetrics().split('\n');

    expect(lines).toContain('merge_runs_total{status="success"} 2');
    expect(lines).toContain('merge_runs_total{status="failed"} 1');
    expect(lines).toContain('merge_conversions_total{status="failed"} 1');
    expect(lines).toContain('merge_uploads_total{status="success"} 1');
    expect(lines).toContain('merge_unmatched_placeholders_total 3');
    expect(lines).toContain('# TYPE merge_runs_total counter');
  });

  it('accumulates durations into cumulative buckets', () => {
    observeMergeDuration(0.2);
    observeMergeDuration(3);

    const lines = serializeMetrics().split('\n');

    expect(lines).toContain('merge_duration_seconds_bucket{le="0.1"} 0');
    expect(lines).toContain('merge_duration_seconds_bucket{le="0.25"} 1');
    expect(lines).toContain('merge_duration_seconds_bucket{le="2.5"} 1');
    expect(lines).toContain('merge_duration_seconds_bucket{le="5"} 2');
    expect(lines).toContain('merge_duration_seconds_bucket{le="+Inf"} 2');
    expect(lines).toContain('merge_duration_seconds_sum 3.2');
    expect(lines).toContain('merge_duration_seconds_count 2');
  });

  it('counts durations beyond the last bucket only in +Inf', () => {
    observeMergeDuration(120);

    const lines = serializeMetrics().split('\n');

    expect(lines).toContain('merge_duration_seconds_bucket{le="60"} 0');
    expect(lines).toContain('merge_duration_seconds_bucket{le="+Inf"} 1');
  });

  it('starts from zero after a reset', () => {
    incMergeRuns('success');
    resetMetrics();

    expect(serializeMetrics()).toContain('merge_runs_total{status="success"} 0\n');
  });
});
