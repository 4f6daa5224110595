/**
 * BLAST summary strings
 *
 * The aggregator keeps each search hit as a short human-readable summary,
 * which is also what lands in the profile. These helpers build and read them.
 */

export const NO_HIT = 'No_hit';

export interface ForwardMetrics {
  name: string;
  pident: number;
  evalue: number;
  length: number;
  qlen: number;
  slen: number;
}

export interface ReverseMetrics {
  name: string;
  pident: number;
  evalue: number;
}

const FORWARD_SUMMARY_PATTERN =
  /^([^(]+)\(([0-9.]+)%, E=([0-9.e+-]+), L=([0-9]+), Q=([0-9]+), S=([0-9]+)\)/;

/**
 * Scientific notation with one decimal and a two-digit exponent: 1.0e-05
 */
export function formatEvalue(evalue: number): string {
  return evalue.toExponential(1).replace(/e([+-])(\d)$/, 'e$10$2');
}

export function formatForwardSummary(metrics: ForwardMetrics): string {
  return (
    `${metrics.name}(${metrics.pident.toFixed(1)}%, E=${formatEvalue(metrics.evalue)}, ` +
    `L=${metrics.length}, Q=${metrics.qlen}, S=${metrics.slen})`
  );
}

export function formatReverseSummary(metrics: ReverseMetrics): string {
  return `${metrics.name}(${metrics.pident.toFixed(1)}%, E=${formatEvalue(metrics.evalue)})`;
}

/**
 * System name of a summary with the metrics suffix stripped
 * `No_hit` means there is no name
 */
export function extractSearchName(summary: string): string | undefined {
  if (summary === NO_HIT) {
    return undefined;
  }
  const match = /^([^(]+)/.exec(summary);
  return match ? match[1].trim() : summary;
}

/**
 * Like extractSearchName, but renders absence as `No_hit` for tables
 */
export function searchNameOrNoHit(summary: string | undefined): string {
  if (summary === undefined || summary.trim() === '') {
    return NO_HIT;
  }
  return extractSearchName(summary) ?? NO_HIT;
}

/**
 * Parse the five metrics back out of a forward summary
 */
export function parseForwardMetrics(summary: string | undefined): ForwardMetrics | undefined {
  if (summary === undefined || summary === NO_HIT) {
    return undefined;
  }

  const match = FORWARD_SUMMARY_PATTERN.exec(summary);
  if (!match) {
    return undefined;
  }

  const metrics: ForwardMetrics = {
    name: match[1].trim(),
    pident: Number(match[2]),
    evalue: Number(match[3]),
    length: Number(match[4]),
    qlen: Number(match[5]),
    slen: Number(match[6]),
  };

  const numbers = [metrics.pident, metrics.evalue, metrics.length, metrics.qlen, metrics.slen];
  return numbers.every(Number.isFinite) ? metrics : undefined;
}
