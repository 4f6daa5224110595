/**
 * Pattern Extractor
 *
 * Collects the MAPPING and CONFLICT rows of every genome's defence profile
 * and groups them by what the tools originally reported, so each distinct
 * pattern is curated once instead of once per protein.
 */

import * as fs from 'fs';
import path from 'path';
import { PROFILE_SUFFIX } from '../config/paths.js';
import { CurationInputError, describeError } from '../errors.js';
import { readHeaderedTable, writeTable, type HeaderedTable } from '../io/tabular.js';
import { NO_HIT, searchNameOrNoHit } from '../evidence/searchSummary.js';
import { UNRESOLVED_STATUSES, isConsensusStatus } from '../types/consensus.js';
import { countDescending } from '../profile/profileSummary.js';
import { logger } from '../utils/logger.js';

export const CURATION_COLUMNS = [
  'PADLOC',
  'DefenseFinder',
  'BLAST_fwd',
  'BLAST_rev',
  'protein_count',
  'example_proteins',
  'TYPE',
  'SUBTYPE',
  'OUTCOME',
] as const;

export type CurationColumn = (typeof CURATION_COLUMNS)[number];

export type CurationRow = Record<CurationColumn, string | number>;

/**
 * An unresolved profile row reduced to what grouping needs
 */
export interface UnresolvedRow {
  proteinId: string;
  genomeId: string;
  status: string;
  padloc: string;
  defenseFinder: string;
  forwardBlast: string;
  reverseBlast: string;
}

export interface UnresolvedPattern {
  padloc: string;
  defenseFinder: string;
  forwardBlast: string;
  reverseBlast: string;
  proteinIds: string[];
  genomeIds: string[];
}

export type ExtractionOutcome =
  | {
      kind: 'nothing-to-curate';
      reason: 'no-profiles' | 'no-unresolved';
      profilesRead: number;
    }
  | {
      kind: 'patterns';
      profilesRead: number;
      totalProteins: number;
      statusBreakdown: Array<{ status: string; count: number }>;
      patterns: UnresolvedPattern[];
      rows: CurationRow[];
    };

export interface PatternExtractorOptions {
  exampleLimit?: number;
}

/**
 * Genome part of a `genome@locus` protein identifier
 */
export function genomeIdFromProteinId(proteinId: string): string {
  const at = proteinId.indexOf('@');
  return at === -1 ? proteinId : proteinId.slice(0, at);
}

/**
 * First few protein ids, plus how many were left out
 */
export function formatExampleProteins(proteinIds: readonly string[], limit = 5): string {
  const examples = proteinIds.slice(0, limit).join(', ');
  const remaining = proteinIds.length - limit;
  return remaining > 0 ? `${examples}, ... (${remaining} more)` : examples;
}

function valueOrNoHit(value: string | undefined): string {
  if (value === undefined) return NO_HIT;
  const trimmed = value.trim();
  return trimmed === '' ? NO_HIT : trimmed;
}

export class PatternExtractor {
  private readonly exampleLimit: number;

  constructor(options: PatternExtractorOptions = {}) {
    this.exampleLimit = options.exampleLimit ?? 5;
  }

  /**
   * Profile files in a consensus directory, sorted by name
   * @throws CurationInputError when the directory does not exist
   */
  findProfileFiles(directory: string): string[] {
    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
      throw new CurationInputError(`Directory not found: ${directory}`, directory);
    }

    return fs
      .readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith(PROFILE_SUFFIX))
      .map((entry) => path.join(directory, entry.name))
      .sort();
  }

  /**
   * MAPPING and CONFLICT rows of one profile; unreadable files yield nothing
   */
  loadUnresolvedRows(filePath: string): UnresolvedRow[] | undefined {
    let table: HeaderedTable;
    try {
      table = readHeaderedTable(filePath);
    } catch (error) {
      logger.warn(`Error processing ${filePath}: ${describeError(error)}`);
      return undefined;
    }

    if (table.rows.length > 0 && !['protein_id', 'status'].every((c) => table.columns.includes(c))) {
      logger.warn(`Skipping ${filePath}: missing protein_id or status column`);
      return undefined;
    }

    const unresolved: UnresolvedRow[] = [];
    for (const row of table.rows) {
      const status = row.status.trim();
      if (!isConsensusStatus(status) || !UNRESOLVED_STATUSES.includes(status)) {
        continue;
      }
      const proteinId = row.protein_id.trim();
      unresolved.push({
        proteinId,
        genomeId: genomeIdFromProteinId(proteinId),
        status,
        padloc: valueOrNoHit(row.padloc_original),
        defenseFinder: valueOrNoHit(row.deffind_original),
        forwardBlast: searchNameOrNoHit(row.fwd_blast),
        reverseBlast: searchNameOrNoHit(row.rev_blast),
      });
    }
    return unresolved;
  }

  /**
   * Group rows by their original-evidence tuple, largest group first
   */
  groupByPattern(rows: readonly UnresolvedRow[]): UnresolvedPattern[] {
    const groups = new Map<string, UnresolvedPattern>();

    for (const row of rows) {
      const key = JSON.stringify([row.padloc, row.defenseFinder, row.forwardBlast, row.reverseBlast]);
      let group = groups.get(key);
      if (!group) {
        group = {
          padloc: row.padloc,
          defenseFinder: row.defenseFinder,
          forwardBlast: row.forwardBlast,
          reverseBlast: row.reverseBlast,
          proteinIds: [],
          genomeIds: [],
        };
        groups.set(key, group);
      }
      group.proteinIds.push(row.proteinId);
      if (!group.genomeIds.includes(row.genomeId)) {
        group.genomeIds.push(row.genomeId);
      }
    }

    return [...groups.values()].sort((a, b) => b.proteinIds.length - a.proteinIds.length);
  }

  toCurationRows(patterns: readonly UnresolvedPattern[]): CurationRow[] {
    return patterns.map((pattern) => ({
      PADLOC: pattern.padloc,
      DefenseFinder: pattern.defenseFinder,
      BLAST_fwd: pattern.forwardBlast,
      BLAST_rev: pattern.reverseBlast,
      protein_count: pattern.proteinIds.length,
      example_proteins: formatExampleProteins(pattern.proteinIds, this.exampleLimit),
      TYPE: '',
      SUBTYPE: '',
      OUTCOME: '',
    }));
  }

  extract(directory: string): ExtractionOutcome {
    const files = this.findProfileFiles(directory);
    if (files.length === 0) {
      logger.warn(`No defence profile files found in ${directory} (*${PROFILE_SUFFIX})`);
      return { kind: 'nothing-to-curate', reason: 'no-profiles', profilesRead: 0 };
    }

    logger.info(`Found ${files.length} defence profile files`);

    const unresolved: UnresolvedRow[] = [];
    let profilesRead = 0;
    for (const file of files) {
      const rows = this.loadUnresolvedRows(file);
      if (rows === undefined) continue;
      profilesRead++;
      unresolved.push(...rows);
    }

    if (unresolved.length === 0) {
      logger.info('No problematic genes found! All consensus files are clean.');
      return {
        kind: 'nothing-to-curate',
        reason: profilesRead === 0 ? 'no-profiles' : 'no-unresolved',
        profilesRead,
      };
    }

    const patterns = this.groupByPattern(unresolved);
    logger.info(`Unique patterns found: ${patterns.length} across ${unresolved.length} proteins`);

    return {
      kind: 'patterns',
      profilesRead,
      totalProteins: unresolved.length,
      statusBreakdown: countDescending(unresolved.map((row) => row.status)).map(
        ({ value, count }) => ({ status: value, count })
      ),
      patterns,
      rows: this.toCurationRows(patterns),
    };
  }

  /**
   * Write the curation template
   */
  writeCurationTemplate(filePath: string, rows: readonly CurationRow[]): void {
    writeTable(filePath, CURATION_COLUMNS, rows);
    logger.info(`Saved to: ${filePath}`);
  }
}
