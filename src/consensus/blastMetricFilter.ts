/**
 * Admissibility check for BLAST-only calls
 *
 * A hit with no classifier support is kept only when query and subject are
 * of similar length and the alignment spans most of both.
 */

import { DEFAULT_BLAST_FILTER, type BlastFilterBounds } from '../config/index.js';
import type { ForwardMetrics } from '../evidence/searchSummary.js';

export interface FilterOutcome {
  passed: boolean;
  reason: string;
}

function within(value: number, bounds: BlastFilterBounds): boolean {
  return value >= bounds.minRatio && value <= bounds.maxRatio;
}

function describeBounds(bounds: BlastFilterBounds): string {
  return `${bounds.minRatio}-${bounds.maxRatio}`;
}

export function passesBlastFiltering(
  metrics: Pick<ForwardMetrics, 'length' | 'qlen' | 'slen'> | undefined,
  bounds: BlastFilterBounds = DEFAULT_BLAST_FILTER
): FilterOutcome {
  if (!metrics) {
    return { passed: false, reason: 'No metrics' };
  }

  const { qlen, slen, length } = metrics;

  const qsRatio = slen > 0 ? qlen / slen : 0;
  if (!within(qsRatio, bounds)) {
    return {
      passed: false,
      reason: `Q/S ratio ${qsRatio.toFixed(3)} outside ${describeBounds(bounds)}`,
    };
  }

  const averageLength = (qlen + slen) / 2;
  const coverage = averageLength > 0 ? length / averageLength : 0;
  if (!within(coverage, bounds)) {
    return {
      passed: false,
      reason: `Coverage ${coverage.toFixed(3)} outside ${describeBounds(bounds)}`,
    };
  }

  return { passed: true, reason: 'Passed filtering' };
}
