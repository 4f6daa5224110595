/**
 * Defence profile rows and the per-genome profile table
 */

import { writeTable } from '../io/tabular.js';
import { NO_HIT, searchNameOrNoHit } from '../evidence/searchSummary.js';
import { canonicalSubtype, type ClassifierCall, type ProteinEvidence } from '../types/evidence.js';
import type { ConsensusStatus, SystemClassification } from '../types/consensus.js';
import { logger } from '../utils/logger.js';

export const PROFILE_COLUMNS = [
  'protein_id',
  'padloc_original',
  'padloc_final',
  'deffind_original',
  'deffind_final',
  'fwd_blast',
  'rev_blast',
  'status',
  'final_consensus',
  'explanation',
  'final_system_type',
  'final_system_subtype',
  'final_system_outcome',
] as const;

export type ProfileColumn = (typeof PROFILE_COLUMNS)[number];

export type ProfileRow = Readonly<Record<ProfileColumn, string>>;

function originalOrNoHit(call: ClassifierCall | undefined): string {
  return call?.original ?? NO_HIT;
}

function mappingOrNoHit(call: ClassifierCall | undefined): string {
  return (call && canonicalSubtype(call.canonical)) ?? NO_HIT;
}

/**
 * Assemble one profile row for a protein that made it through consensus
 */
export function buildProfileRow(
  evidence: ProteinEvidence,
  status: ConsensusStatus,
  finalConsensus: string,
  explanation: string,
  classification: SystemClassification
): ProfileRow {
  return {
    protein_id: evidence.proteinId,
    padloc_original: originalOrNoHit(evidence.padloc),
    padloc_final: mappingOrNoHit(evidence.padloc),
    deffind_original: originalOrNoHit(evidence.defenseFinder),
    deffind_final: mappingOrNoHit(evidence.defenseFinder),
    fwd_blast: searchNameOrNoHit(evidence.forwardSearch),
    rev_blast: searchNameOrNoHit(evidence.reverseSearch),
    status,
    final_consensus: finalConsensus,
    explanation,
    final_system_type: classification.type,
    final_system_subtype: finalConsensus,
    final_system_outcome: classification.outcome,
  };
}

/**
 * Write a genome's profile; an empty profile still gets its header
 */
export function writeProfile(filePath: string, rows: readonly ProfileRow[]): void {
  writeTable(filePath, PROFILE_COLUMNS, rows);
  logger.info(`Final defence profile saved: ${filePath} (${rows.length} rows)`);
}
