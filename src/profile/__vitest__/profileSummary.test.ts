import { describe, it, expect } from 'vitest';
import {
  countDescending,
  emptyStatusCounts,
  formatProfileSummary,
  summarizeProfile,
} from '../profileSummary.js';
import type { ProfileRow } from '../ProfileWriter.js';

function row(proteinId: string, type: string, outcome: string): ProfileRow {
  return {
    protein_id: proteinId,
    padloc_original: 'No_hit',
    padloc_final: 'No_hit',
    deffind_original: 'No_hit',
    deffind_final: 'No_hit',
    fwd_blast: 'No_hit',
    rev_blast: 'No_hit',
    status: 'SINGLE',
    final_consensus: proteinId,
    explanation: 'PADLOC only with mapping',
    final_system_type: type,
    final_system_subtype: proteinId,
    final_system_outcome: outcome,
  };
}

describe('profileSummary', () => {
  it('orders counts descending and keeps first-seen order on ties', () => {
    expect(countDescending(['b', 'a', 'b', 'c', 'a', 'b'])).toEqual([
      { value: 'b', count: 3 },
      { value: 'a', count: 2 },
      { value: 'c', count: 1 },
    ]);
    expect(countDescending(['x', 'y'])).toEqual([
      { value: 'x', count: 1 },
      { value: 'y', count: 1 },
    ]);
  });

  it('counts mapped rows by type and breaks them down by outcome', () => {
    const statusCounts = { ...emptyStatusCounts(), SINGLE: 3, FILTERED: 1 };
    const rows = [
      row('g1@a', 'CBASS', 'Abi'),
      row('g1@b', 'UNMAPPED_TYPE', 'UNMAPPED_OUTCOME'),
      row('g1@c', 'Gabija', 'Degradation'),
    ];

    const summary = summarizeProfile(statusCounts, rows, 2);

    expect(summary).toMatchObject({
      totalProteins: 4,
      profiledProteins: 3,
      filteredProteins: 1,
      mappedCount: 2,
      unmappedCount: 1,
      outcomeBreakdown: [
        { outcome: 'Abi', count: 1 },
        { outcome: 'Degradation', count: 1 },
      ],
    });
    expect(summary.sample.map((sampled) => sampled.protein_id)).toEqual(['g1@a', 'g1@b']);
  });

  it('formats the summary for the terminal', () => {
    const statusCounts = { ...emptyStatusCounts(), SINGLE: 3, FILTERED: 1 };
    const rows = [row('g1@a', 'CBASS', 'Abi'), row('g1@b', 'UNMAPPED_TYPE', 'UNMAPPED_OUTCOME'), row('g1@c', 'CBASS', 'Abi')];

    expect(formatProfileSummary(summarizeProfile(statusCounts, rows))).toEqual([
      'DEFENCE PROFILE SUMMARY:',
      'Total proteins processed: 4',
      'Proteins in final profile: 3',
      'Proteins filtered out: 1',
      '',
      'STATUS BREAKDOWN:',
      '  SINGLE: 3 (75.0%)',
      '  FILTERED: 1 (25.0%)',
      '',
      'FINAL CLASSIFICATIONS:',
      '  Mapped to master key: 2 (66.7%)',
      '  Unmapped (novel/species-specific): 1 (33.3%)',
      '',
      'DEFENCE OUTCOME BREAKDOWN (mapped entries):',
      '  Abi: 2',
    ]);
  });

  it('omits classification lines for an empty profile', () => {
    expect(formatProfileSummary(summarizeProfile(emptyStatusCounts(), []))).toEqual([
      'DEFENCE PROFILE SUMMARY:',
      'Total proteins processed: 0',
      'Proteins in final profile: 0',
      'Proteins filtered out: 0',
      '',
      'STATUS BREAKDOWN:',
    ]);
  });
});
