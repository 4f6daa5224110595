/**
 * Classification Resolver
 *
 * Turns a final consensus name into a system type and defence outcome.
 * Composite placeholders are resolved side by side and re-composed, so a
 * half-known composite still shows the half that is known.
 */

import {
  UNMAPPED_OUTCOME,
  UNMAPPED_SIDE,
  UNMAPPED_TYPE,
  type CompositeName,
  type FinalCall,
  type SystemClassification,
} from '../types/consensus.js';
import type { MappingTable } from '../mapping/MappingTable.js';
import { looksComposite, parseCompositeName } from '../consensus/CompositeName.js';

const UNMAPPED: SystemClassification = { type: UNMAPPED_TYPE, outcome: UNMAPPED_OUTCOME };

export class ClassificationResolver {
  constructor(private readonly mappingTable: MappingTable) {}

  /**
   * Classify a decided call without going through its string form
   */
  classify(call: FinalCall): SystemClassification {
    return call.kind === 'composite'
      ? this.resolveComposite(call.name)
      : this.mappingTable.classify(call.name);
  }

  /**
   * Classify a final_consensus value read back from a profile row
   */
  resolve(finalName: string): SystemClassification {
    if (looksComposite(finalName)) {
      const parsed = parseCompositeName(finalName);
      return parsed ? this.resolveComposite(parsed) : UNMAPPED;
    }
    return this.mappingTable.classify(finalName);
  }

  resolveComposite(name: CompositeName): SystemClassification {
    const padloc = this.side(name.padloc);
    const defenseFinder = this.side(name.defenseFinder);

    return {
      type: `(p::${padloc?.type ?? UNMAPPED_SIDE}|d::${defenseFinder?.type ?? UNMAPPED_SIDE})`,
      outcome: `(p::${padloc?.outcome ?? UNMAPPED_SIDE}|d::${defenseFinder?.outcome ?? UNMAPPED_SIDE})`,
    };
  }

  private side(subtype: string | null): SystemClassification | undefined {
    return subtype === null ? undefined : this.mappingTable.findClassification(subtype);
  }
}
