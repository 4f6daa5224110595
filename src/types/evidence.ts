/**
 * Evidence types shared by the aggregator and the consensus engine
 */

/**
 * Result of looking a tool-specific name up in the mapping table
 */
export type CanonicalCall =
  | { kind: 'mapped'; subtype: string }
  | { kind: 'no-mapping' };

export const NO_MAPPING: CanonicalCall = { kind: 'no-mapping' };

export function mapped(subtype: string): CanonicalCall {
  return { kind: 'mapped', subtype };
}

/**
 * Mapped subtype of a call, or undefined when the table has no entry
 */
export function canonicalSubtype(call: CanonicalCall): string | undefined {
  return call.kind === 'mapped' ? call.subtype : undefined;
}

/**
 * A classifier's call for one protein: the (suffix-normalized) name the
 * tool reported, and what the mapping table made of it
 */
export interface ClassifierCall {
  original: string;
  canonical: CanonicalCall;
}

/**
 * Everything known about one protein across the four sources
 * Each source owns exactly one field here
 */
export interface ProteinEvidence {
  proteinId: string;
  padloc?: ClassifierCall;
  defenseFinder?: ClassifierCall;
  /** e.g. `CBASS_IIs(98.2%, E=1.0e-50, L=300, Q=300, S=305)` */
  forwardSearch?: string;
  /** e.g. `CBASS_IIs(97.0%, E=2.0e-40)` */
  reverseSearch?: string;
}

export type EvidenceSourceName = 'padloc' | 'defenseFinder' | 'forwardBlast' | 'reverseBlast';

export type EvidenceSourceState = 'missing' | 'empty' | 'no-rows' | 'loaded' | 'unreadable';

/**
 * What happened while reading one evidence source
 */
export interface SourceReport {
  source: EvidenceSourceName;
  filePath: string;
  state: EvidenceSourceState;
  rowsRead: number;
  accepted: number;
  skipped: number;
}
