/**
 * Composite placeholder `(p::<padloc>|d::<defensefinder>)`
 *
 * Written into the profile when the two classifiers could not be collapsed
 * into one name. Either side may be empty. Downstream classification and
 * curation parse this exact syntax.
 */

import type { CompositeName, FinalCall } from '../types/consensus.js';

const COMPOSITE_PREFIX = '(p::';
const COMPOSITE_PATTERN = /^\(p::([^|]*)\|d::([^)]*)\)/;

export function composite(padloc: string | null, defenseFinder: string | null): CompositeName {
  return { padloc, defenseFinder };
}

export function formatCompositeName(name: CompositeName): string {
  return `(p::${name.padloc ?? ''}|d::${name.defenseFinder ?? ''})`;
}

/**
 * True when the value claims to be a composite, whether or not it parses
 */
export function looksComposite(value: string): boolean {
  return value.startsWith(COMPOSITE_PREFIX) && value.includes('|d::');
}

/**
 * Split a composite placeholder into its two sides
 * Blank sides come back as null; anything unparseable as undefined
 */
export function parseCompositeName(value: string): CompositeName | undefined {
  const match = COMPOSITE_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const padloc = match[1].trim();
  const defenseFinder = match[2].trim();
  return {
    padloc: padloc === '' ? null : padloc,
    defenseFinder: defenseFinder === '' ? null : defenseFinder,
  };
}

/**
 * Serialize a final call for the profile's final_consensus column
 */
export function formatFinalCall(call: FinalCall): string {
  return call.kind === 'system' ? call.name : formatCompositeName(call.name);
}
