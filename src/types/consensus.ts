/**
 * Consensus result types
 */

export const CONSENSUS_STATUSES = [
  'AGREE',
  'RESOLVED',
  'CONFLICT',
  'MAPPING',
  'SINGLE',
  'BLAST',
  'FILTERED',
  'ERROR',
] as const;

export type ConsensusStatus = (typeof CONSENSUS_STATUSES)[number];

export function isConsensusStatus(value: string): value is ConsensusStatus {
  return (CONSENSUS_STATUSES as readonly string[]).includes(value);
}

/**
 * Statuses that need a human to look at the pattern
 */
export const UNRESOLVED_STATUSES: readonly ConsensusStatus[] = ['MAPPING', 'CONFLICT'];

/**
 * Two-slot placeholder for calls the engine could not collapse to one name.
 * A null slot renders as an empty side.
 */
export interface CompositeName {
  padloc: string | null;
  defenseFinder: string | null;
}

export type FinalCall =
  | { kind: 'system'; name: string }
  | { kind: 'composite'; name: CompositeName };

export interface VoteTally {
  padloc: number;
  defenseFinder: number;
}

/**
 * Outcome of the consensus decision for one protein
 */
export type ConsensusResult =
  | {
      status: Exclude<ConsensusStatus, 'FILTERED' | 'ERROR'>;
      finalCall: FinalCall;
      explanation: string;
      votes?: VoteTally;
    }
  | {
      status: 'FILTERED' | 'ERROR';
      finalCall?: undefined;
      explanation: string;
      votes?: undefined;
    };

/**
 * Type and outcome resolved from the mapping table
 */
export interface SystemClassification {
  type: string;
  outcome: string;
}

export const UNMAPPED_TYPE = 'UNMAPPED_TYPE';
export const UNMAPPED_OUTCOME = 'UNMAPPED_OUTCOME';
export const UNMAPPED_SIDE = 'UNMAPPED';
