/**
 * Consensus Engine
 *
 * Decides one system call per protein from up to four pieces of evidence:
 * the PADLOC and DefenseFinder calls (with their canonical mappings) and the
 * forward and reverse BLAST hits.
 *
 * Decision order:
 * 1. No classifier evidence: BLAST-only, both directions must agree and pass
 *    the metric filter
 * 2. One classifier: its mapping if it has one, else a MAPPING placeholder
 * 3. Both classifiers: AGREE on identical mappings, otherwise BLAST votes
 *    decide between them
 */

import { DEFAULT_BLAST_FILTER, type BlastFilterBounds } from '../config/index.js';
import { extractSearchName, parseForwardMetrics } from '../evidence/searchSummary.js';
import {
  canonicalSubtype,
  type ClassifierCall,
  type ProteinEvidence,
} from '../types/evidence.js';
import type { ConsensusResult, FinalCall, VoteTally } from '../types/consensus.js';
import { passesBlastFiltering } from './blastMetricFilter.js';
import { composite } from './CompositeName.js';

export interface ConsensusEngineOptions {
  blastFilter?: BlastFilterBounds;
}

type Direction = 'Forward' | 'Reverse';

function system(name: string): FinalCall {
  return { kind: 'system', name };
}

function placeholder(padloc: string | null, defenseFinder: string | null): FinalCall {
  return { kind: 'composite', name: composite(padloc, defenseFinder) };
}

function searchName(summary: string | undefined): string | undefined {
  return summary === undefined ? undefined : extractSearchName(summary);
}

export class ConsensusEngine {
  private readonly blastFilter: BlastFilterBounds;

  constructor(options: ConsensusEngineOptions = {}) {
    this.blastFilter = options.blastFilter ?? DEFAULT_BLAST_FILTER;
  }

  decide(evidence: ProteinEvidence): ConsensusResult {
    const { padloc, defenseFinder } = evidence;

    if (!padloc && !defenseFinder) {
      return this.decideBlastOnly(evidence);
    }

    if (padloc && !defenseFinder) {
      const subtype = canonicalSubtype(padloc.canonical);
      if (subtype !== undefined) {
        return { status: 'SINGLE', finalCall: system(subtype), explanation: 'PADLOC only with mapping' };
      }
      return {
        status: 'MAPPING',
        finalCall: placeholder(padloc.original, null),
        explanation: 'PADLOC only without mapping',
      };
    }

    if (!padloc && defenseFinder) {
      const subtype = canonicalSubtype(defenseFinder.canonical);
      if (subtype !== undefined) {
        return {
          status: 'SINGLE',
          finalCall: system(subtype),
          explanation: 'DefenseFinder only with mapping',
        };
      }
      return {
        status: 'MAPPING',
        finalCall: placeholder(null, defenseFinder.original),
        explanation: 'DefenseFinder only without mapping',
      };
    }

    if (padloc && defenseFinder) {
      return this.decideBothClassifiers(evidence, padloc, defenseFinder);
    }

    return { status: 'ERROR', explanation: 'Unexpected case in consensus logic' };
  }

  private decideBlastOnly(evidence: ProteinEvidence): ConsensusResult {
    const forwardName = searchName(evidence.forwardSearch);
    const reverseName = searchName(evidence.reverseSearch);

    if (forwardName === undefined || reverseName === undefined) {
      return {
        status: 'FILTERED',
        explanation: 'Insufficient BLAST evidence (need both forward and reverse)',
      };
    }

    if (forwardName !== reverseName) {
      return {
        status: 'FILTERED',
        explanation: `BLAST names disagree: ${forwardName} vs ${reverseName}`,
      };
    }

    const metrics = parseForwardMetrics(evidence.forwardSearch);
    if (!metrics) {
      return { status: 'FILTERED', explanation: 'Could not parse forward BLAST metrics' };
    }

    const outcome = passesBlastFiltering(metrics, this.blastFilter);
    if (!outcome.passed) {
      return {
        status: 'FILTERED',
        explanation: `BLAST-only hit failed filtering: ${outcome.reason}`,
      };
    }

    return {
      status: 'BLAST',
      finalCall: system(forwardName),
      explanation: `BLAST-only hit passed filtering: ${outcome.reason}`,
    };
  }

  private decideBothClassifiers(
    evidence: ProteinEvidence,
    padloc: ClassifierCall,
    defenseFinder: ClassifierCall
  ): ConsensusResult {
    const padlocMapping = canonicalSubtype(padloc.canonical);
    const finderMapping = canonicalSubtype(defenseFinder.canonical);
    const originals = placeholder(padloc.original, defenseFinder.original);

    if (padlocMapping === undefined && finderMapping === undefined) {
      return { status: 'MAPPING', finalCall: originals, explanation: 'Both tools without mapping' };
    }

    if (padlocMapping !== undefined && padlocMapping === finderMapping) {
      return {
        status: 'AGREE',
        finalCall: system(padlocMapping),
        explanation: 'Both tools agree on consensus',
      };
    }

    // Each tool votes for itself; each BLAST direction backs at most one of them
    const votes: VoteTally = { padloc: 1, defenseFinder: 1 };
    const support: string[] = [];

    const castVote = (direction: Direction, name: string | undefined): void => {
      if (name === undefined) return;
      if (padlocMapping !== undefined && name === padlocMapping) {
        votes.padloc++;
        support.push(`${direction} supports PADLOC (${name})`);
      } else if (finderMapping !== undefined && name === finderMapping) {
        votes.defenseFinder++;
        support.push(`${direction} supports DefenseFinder (${name})`);
      } else {
        support.push(`${direction} supports neither (${name})`);
      }
    };

    castVote('Forward', searchName(evidence.forwardSearch));
    castVote('Reverse', searchName(evidence.reverseSearch));

    const detail = support.join('; ');

    if (votes.padloc > votes.defenseFinder) {
      if (padlocMapping !== undefined) {
        return {
          status: 'RESOLVED',
          finalCall: system(padlocMapping),
          explanation: `PADLOC wins voting ${votes.padloc}vs${votes.defenseFinder}: ${detail}`,
          votes,
        };
      }
      return {
        status: 'MAPPING',
        finalCall: originals,
        explanation: `PADLOC wins voting but no mapping: ${detail}`,
        votes,
      };
    }

    if (votes.defenseFinder > votes.padloc) {
      if (finderMapping !== undefined) {
        return {
          status: 'RESOLVED',
          finalCall: system(finderMapping),
          explanation: `DefenseFinder wins voting ${votes.defenseFinder}vs${votes.padloc}: ${detail}`,
          votes,
        };
      }
      return {
        status: 'MAPPING',
        finalCall: originals,
        explanation: `DefenseFinder wins voting but no mapping: ${detail}`,
        votes,
      };
    }

    if (padlocMapping !== undefined && finderMapping !== undefined) {
      return {
        status: 'CONFLICT',
        finalCall: placeholder(padlocMapping, finderMapping),
        explanation: `Tied votes ${votes.padloc}vs${votes.defenseFinder}: ${detail}`,
        votes,
      };
    }

    // TODO: a tie with exactly one mapped tool discards that mapping; confirm with curators
    return {
      status: 'MAPPING',
      finalCall: originals,
      explanation: `Tied votes with mapping issues: ${detail}`,
      votes,
    };
  }
}
