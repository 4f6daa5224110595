/**
 * Mapping Table
 *
 * Normalizes PADLOC and DefenseFinder vocabulary into the shared naming
 * scheme, and classifies canonical subtypes into a system type and defence
 * outcome. Built once from the reference table, read-only afterwards.
 */

import { MappingTableError, describeError } from '../errors.js';
import { readHeaderedTable, inspectTabularFile, type HeaderedTable } from '../io/tabular.js';
import { logger } from '../utils/logger.js';
import { NO_MAPPING, mapped, type CanonicalCall } from '../types/evidence.js';
import {
  UNMAPPED_OUTCOME,
  UNMAPPED_TYPE,
  type SystemClassification,
} from '../types/consensus.js';

export const MAPPING_COLUMNS = {
  padloc: 'PADLOC_systems',
  defenseFinder: 'DefenseFinder_subtypes',
  subtype: 'Novel_subtypes',
  type: 'Novel_types',
  outcome: 'Defense_outcome',
} as const;

/**
 * One reference row after sentinel handling; null means "no value"
 */
export interface MappingEntry {
  padloc: string | null;
  defenseFinder: string | null;
  subtype: string | null;
  type: string | null;
  outcome: string | null;
}

export interface MappingTableStats {
  padlocMappings: number;
  defenseFinderMappings: number;
  classificationEntries: number;
}

const NO_MAPPING_SENTINEL = '/';

function cell(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === NO_MAPPING_SENTINEL) return null;
  return trimmed;
}

/**
 * Convert a raw reference row into a MappingEntry
 */
export function toMappingEntry(row: Record<string, string>): MappingEntry {
  return {
    padloc: cell(row[MAPPING_COLUMNS.padloc]),
    defenseFinder: cell(row[MAPPING_COLUMNS.defenseFinder]),
    subtype: cell(row[MAPPING_COLUMNS.subtype]),
    type: cell(row[MAPPING_COLUMNS.type]),
    outcome: cell(row[MAPPING_COLUMNS.outcome]),
  };
}

export class MappingTable {
  private constructor(
    private readonly padloc: ReadonlyMap<string, string>,
    private readonly defenseFinder: ReadonlyMap<string, string>,
    private readonly classification: ReadonlyMap<string, SystemClassification>
  ) {}

  /**
   * Build the three lookups from reference rows. Later rows win on duplicate keys.
   */
  static fromEntries(entries: Iterable<MappingEntry>): MappingTable {
    const padloc = new Map<string, string>();
    const defenseFinder = new Map<string, string>();
    const classification = new Map<string, SystemClassification>();

    for (const entry of entries) {
      if (!entry.subtype) {
        if (entry.padloc || entry.defenseFinder) {
          logger.debug('Skipping mapping row without a canonical subtype', entry);
        }
        continue;
      }

      if (entry.padloc) {
        padloc.set(entry.padloc, entry.subtype);
      }
      if (entry.defenseFinder) {
        defenseFinder.set(entry.defenseFinder, entry.subtype);
      }
      classification.set(entry.subtype, {
        type: entry.type ?? UNMAPPED_TYPE,
        outcome: entry.outcome ?? UNMAPPED_OUTCOME,
      });
    }

    return new MappingTable(padloc, defenseFinder, classification);
  }

  static fromRows(rows: Iterable<Record<string, string>>): MappingTable {
    const entries: MappingEntry[] = [];
    for (const row of rows) {
      entries.push(toMappingEntry(row));
    }
    return MappingTable.fromEntries(entries);
  }

  /**
   * Load the tab-separated reference table
   * @throws MappingTableError when the file is missing, empty or lacks columns
   */
  static load(filePath: string): MappingTable {
    logger.info(`Loading master key: ${filePath}`);

    const state = inspectTabularFile(filePath);
    if (state === 'missing') {
      throw new MappingTableError(`Mapping table not found: ${filePath}`, filePath);
    }
    if (state === 'empty') {
      throw new MappingTableError(`Mapping table is empty: ${filePath}`, filePath);
    }

    let table: HeaderedTable;
    try {
      table = readHeaderedTable(filePath, { delimiter: '\t' });
    } catch (error) {
      throw new MappingTableError(
        `Failed to read mapping table ${filePath}: ${describeError(error)}`,
        filePath
      );
    }

    const missing = Object.values(MAPPING_COLUMNS).filter(
      (column) => !table.columns.includes(column)
    );
    if (missing.length > 0) {
      throw new MappingTableError(
        `Mapping table ${filePath} is missing columns: ${missing.join(', ')}`,
        filePath
      );
    }

    const mappingTable = MappingTable.fromRows(table.rows);
    logger.info(`Master key entries: ${table.rows.length}`, mappingTable.stats);
    return mappingTable;
  }

  lookupPadloc(name: string): CanonicalCall {
    const subtype = this.padloc.get(name);
    return subtype === undefined ? NO_MAPPING : mapped(subtype);
  }

  lookupDefenseFinder(name: string): CanonicalCall {
    const subtype = this.defenseFinder.get(name);
    return subtype === undefined ? NO_MAPPING : mapped(subtype);
  }

  /**
   * Classification for a canonical subtype, if the table has one
   */
  findClassification(subtype: string): SystemClassification | undefined {
    return this.classification.get(subtype);
  }

  /**
   * Classification for a canonical subtype, falling back to the unmapped sentinels
   */
  classify(subtype: string): SystemClassification {
    return (
      this.classification.get(subtype) ?? { type: UNMAPPED_TYPE, outcome: UNMAPPED_OUTCOME }
    );
  }

  get stats(): MappingTableStats {
    return {
      padlocMappings: this.padloc.size,
      defenseFinderMappings: this.defenseFinder.size,
      classificationEntries: this.classification.size,
    };
  }
}
