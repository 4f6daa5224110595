/**
 * Run summary for one genome's profile
 */

import {
  CONSENSUS_STATUSES,
  UNMAPPED_TYPE,
  type ConsensusStatus,
} from '../types/consensus.js';
import type { ProfileRow } from './ProfileWriter.js';

export interface ProfileSummary {
  totalProteins: number;
  profiledProteins: number;
  filteredProteins: number;
  statusCounts: Record<ConsensusStatus, number>;
  mappedCount: number;
  unmappedCount: number;
  /** Outcome counts among mapped rows, most frequent first */
  outcomeBreakdown: Array<{ outcome: string; count: number }>;
  sample: ProfileRow[];
}

export function emptyStatusCounts(): Record<ConsensusStatus, number> {
  return {
    AGREE: 0,
    RESOLVED: 0,
    CONFLICT: 0,
    MAPPING: 0,
    SINGLE: 0,
    BLAST: 0,
    FILTERED: 0,
    ERROR: 0,
  };
}

/**
 * Count occurrences and order by descending count; equal counts keep first-seen order
 */
export function countDescending(values: Iterable<string>): Array<{ value: string; count: number }> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
}

export function summarizeProfile(
  statusCounts: Record<ConsensusStatus, number>,
  rows: readonly ProfileRow[],
  sampleSize = 5
): ProfileSummary {
  const totalProteins = Object.values(statusCounts).reduce((sum, count) => sum + count, 0);
  const mapped = rows.filter((row) => row.final_system_type !== UNMAPPED_TYPE);

  return {
    totalProteins,
    profiledProteins: rows.length,
    filteredProteins: statusCounts.FILTERED,
    statusCounts: { ...statusCounts },
    mappedCount: mapped.length,
    unmappedCount: rows.length - mapped.length,
    outcomeBreakdown: countDescending(mapped.map((row) => row.final_system_outcome)).map(
      ({ value, count }) => ({ outcome: value, count })
    ),
    sample: rows.slice(0, sampleSize),
  };
}

function percent(count: number, total: number): string {
  return total > 0 ? ((count / total) * 100).toFixed(1) : '0.0';
}

/**
 * Human-readable lines for the CLI
 */
export function formatProfileSummary(summary: ProfileSummary): string[] {
  const lines = [
    'DEFENCE PROFILE SUMMARY:',
    `Total proteins processed: ${summary.totalProteins}`,
    `Proteins in final profile: ${summary.profiledProteins}`,
    `Proteins filtered out: ${summary.filteredProteins}`,
    '',
    'STATUS BREAKDOWN:',
  ];

  for (const status of CONSENSUS_STATUSES) {
    const count = summary.statusCounts[status];
    if (count > 0) {
      lines.push(`  ${status}: ${count} (${percent(count, summary.totalProteins)}%)`);
    }
  }

  if (summary.profiledProteins > 0) {
    lines.push(
      '',
      'FINAL CLASSIFICATIONS:',
      `  Mapped to master key: ${summary.mappedCount} (${percent(summary.mappedCount, summary.profiledProteins)}%)`,
      `  Unmapped (novel/species-specific): ${summary.unmappedCount} (${percent(summary.unmappedCount, summary.profiledProteins)}%)`
    );

    if (summary.outcomeBreakdown.length > 0) {
      lines.push('', 'DEFENCE OUTCOME BREAKDOWN (mapped entries):');
      for (const { outcome, count } of summary.outcomeBreakdown) {
        lines.push(`  ${outcome}: ${count}`);
      }
    }
  }

  return lines;
}
