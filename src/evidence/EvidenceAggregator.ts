/**
 * Evidence Aggregator
 *
 * Reads the four per-genome evidence sources and merges them into one
 * ProteinEvidence record per protein identifier.
 *
 * Each source is independent: a missing, empty or unparseable file yields
 * zero evidence for that source and the others still run. Bad rows are
 * skipped with a warning.
 */

import { EvidenceSourceError, describeError } from '../errors.js';
import {
  inspectTabularFile,
  readHeaderedTable,
  readRawTable,
  type HeaderedTable,
} from '../io/tabular.js';
import type { MappingTable } from '../mapping/MappingTable.js';
import { normalizeSystemName, systemFromBlastId } from '../mapping/systemName.js';
import type {
  ClassifierCall,
  EvidenceSourceName,
  ProteinEvidence,
  SourceReport,
} from '../types/evidence.js';
import { logger } from '../utils/logger.js';
import { formatForwardSummary, formatReverseSummary } from './searchSummary.js';

/**
 * Column order of the tabular BLAST output (-outfmt "6 ... qcovs qlen slen")
 */
export const BLAST_COLUMNS = [
  'qseqid',
  'sseqid',
  'pident',
  'length',
  'mismatch',
  'gapopen',
  'qstart',
  'qend',
  'sstart',
  'send',
  'evalue',
  'bitscore',
  'qcovs',
  'qlen',
  'slen',
] as const;

type BlastColumn = (typeof BLAST_COLUMNS)[number];

export interface EvidenceFiles {
  padloc: string;
  defenseFinder: string;
  forwardBlast: string;
  reverseBlast: string;
}

export interface EvidenceAggregatorOptions {
  /** Fail when an evidence file does not exist */
  strictInputs?: boolean;
}

export interface AggregatedEvidence {
  proteins: Map<string, ProteinEvidence>;
  reports: SourceReport[];
}

interface ClassifierSource {
  source: 'padloc' | 'defenseFinder';
  label: string;
  delimiter: string;
  idColumn: string;
  callColumn: string;
  lookup: (name: string) => ClassifierCall['canonical'];
}

const SOURCE_LABELS: Record<EvidenceSourceName, string> = {
  padloc: 'PADLOC',
  defenseFinder: 'DefenseFinder',
  forwardBlast: 'Forward BLAST',
  reverseBlast: 'Reverse BLAST',
};

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

function toNumber(value: string | undefined): number | undefined {
  const text = nonEmpty(value);
  if (text === undefined) return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function toInteger(value: string | undefined): number | undefined {
  const parsed = toNumber(value);
  return parsed === undefined ? undefined : Math.trunc(parsed);
}

function blastCell(cells: string[], column: BlastColumn): string | undefined {
  return cells[BLAST_COLUMNS.indexOf(column)];
}

export class EvidenceAggregator {
  private readonly proteins = new Map<string, ProteinEvidence>();
  private readonly reports: SourceReport[] = [];

  constructor(
    private readonly mappingTable: MappingTable,
    private readonly options: EvidenceAggregatorOptions = {}
  ) {}

  /**
   * Read all four sources and return the merged evidence
   */
  aggregate(files: EvidenceFiles): AggregatedEvidence {
    this.addPadloc(files.padloc);
    this.addDefenseFinder(files.defenseFinder);
    this.addForwardBlast(files.forwardBlast);
    this.addReverseBlast(files.reverseBlast);
    return this.result();
  }

  result(): AggregatedEvidence {
    return { proteins: this.proteins, reports: [...this.reports] };
  }

  addPadloc(filePath: string): SourceReport {
    return this.addClassifier(filePath, {
      source: 'padloc',
      label: SOURCE_LABELS.padloc,
      delimiter: ',',
      idColumn: 'target.name',
      callColumn: 'system',
      lookup: (name) => this.mappingTable.lookupPadloc(name),
    });
  }

  addDefenseFinder(filePath: string): SourceReport {
    return this.addClassifier(filePath, {
      source: 'defenseFinder',
      label: SOURCE_LABELS.defenseFinder,
      delimiter: '\t',
      idColumn: 'hit_id',
      callColumn: 'subtype',
      lookup: (name) => this.mappingTable.lookupDefenseFinder(name),
    });
  }

  /**
   * Forward search: genome protein is the query, reference system the subject
   */
  addForwardBlast(filePath: string): SourceReport {
    return this.addBlast(filePath, 'forwardBlast', (cells) => {
      const proteinId = nonEmpty(blastCell(cells, 'qseqid'));
      const subjectId = nonEmpty(blastCell(cells, 'sseqid'));
      if (!proteinId || !subjectId) {
        logger.warn(`Skipping Forward BLAST row with invalid ids: ${cells.slice(0, 2).join(' ')}`);
        return false;
      }

      const pident = toNumber(blastCell(cells, 'pident'));
      const evalue = toNumber(blastCell(cells, 'evalue'));
      const length = toInteger(blastCell(cells, 'length'));
      const qlen = toInteger(blastCell(cells, 'qlen'));
      const slen = toInteger(blastCell(cells, 'slen'));
      if (
        pident === undefined ||
        evalue === undefined ||
        length === undefined ||
        qlen === undefined ||
        slen === undefined
      ) {
        logger.warn(`Skipping Forward BLAST row with invalid numeric data for ${proteinId}`);
        return false;
      }

      this.ensure(proteinId).forwardSearch = formatForwardSummary({
        name: systemFromBlastId(subjectId),
        pident,
        evalue,
        length,
        qlen,
        slen,
      });
      return true;
    });
  }

  /**
   * Reverse search: reference system is the query, genome protein the subject
   */
  addReverseBlast(filePath: string): SourceReport {
    return this.addBlast(filePath, 'reverseBlast', (cells) => {
      const proteinId = nonEmpty(blastCell(cells, 'sseqid'));
      const queryId = nonEmpty(blastCell(cells, 'qseqid'));
      if (!proteinId || !queryId) {
        logger.warn(`Skipping Reverse BLAST row with invalid ids: ${cells.slice(0, 2).join(' ')}`);
        return false;
      }

      const pident = toNumber(blastCell(cells, 'pident'));
      const evalue = toNumber(blastCell(cells, 'evalue'));
      if (pident === undefined || evalue === undefined) {
        logger.warn(`Skipping Reverse BLAST row with invalid numeric data for ${proteinId}`);
        return false;
      }

      this.ensure(proteinId).reverseSearch = formatReverseSummary({
        name: systemFromBlastId(queryId),
        pident,
        evalue,
      });
      return true;
    });
  }

  private addClassifier(filePath: string, classifier: ClassifierSource): SourceReport {
    const report = this.startReport(classifier.source, filePath);
    if (report.state !== 'loaded') {
      return this.finishReport(report);
    }

    let table: HeaderedTable;
    try {
      table = readHeaderedTable(filePath, { delimiter: classifier.delimiter });
    } catch (error) {
      logger.error(`Error parsing ${classifier.label} file ${filePath}: ${describeError(error)}`);
      report.state = 'unreadable';
      return this.finishReport(report);
    }

    if (table.rows.length === 0) {
      logger.info(`${classifier.label} file has headers but no data rows - no defence systems found`);
      report.state = 'no-rows';
      return this.finishReport(report);
    }

    const missing = [classifier.idColumn, classifier.callColumn].filter(
      (column) => !table.columns.includes(column)
    );
    if (missing.length > 0) {
      throw new EvidenceSourceError(
        `${classifier.label} file ${filePath} is missing required columns: ${missing.join(', ')}`,
        classifier.source,
        filePath
      );
    }

    logger.info(`${classifier.label} entries found: ${table.rows.length}`);

    for (const row of table.rows) {
      report.rowsRead++;
      const proteinId = nonEmpty(row[classifier.idColumn]);
      if (!proteinId) {
        logger.warn(`Skipping ${classifier.label} row with invalid protein_id: '${row[classifier.idColumn]}'`);
        report.skipped++;
        continue;
      }

      const call = nonEmpty(row[classifier.callColumn]);
      if (!call) {
        logger.warn(`Skipping ${classifier.label} row with invalid ${classifier.callColumn} for ${proteinId}`);
        report.skipped++;
        continue;
      }

      const original = normalizeSystemName(call);
      this.ensure(proteinId)[classifier.source] = {
        original,
        canonical: classifier.lookup(original),
      };
      report.accepted++;
    }

    return this.finishReport(report);
  }

  private addBlast(
    filePath: string,
    source: 'forwardBlast' | 'reverseBlast',
    handleRow: (cells: string[]) => boolean
  ): SourceReport {
    const label = SOURCE_LABELS[source];
    const report = this.startReport(source, filePath);
    if (report.state !== 'loaded') {
      return this.finishReport(report);
    }

    let rows: string[][];
    try {
      rows = readRawTable(filePath, { delimiter: '\t' });
    } catch (error) {
      logger.error(`Error processing ${label} file ${filePath}: ${describeError(error)}`);
      report.state = 'unreadable';
      return this.finishReport(report);
    }

    if (rows.length === 0) {
      logger.info(`${label} file has no data - no matches found`);
      report.state = 'no-rows';
      return this.finishReport(report);
    }

    logger.info(`${label} entries found: ${rows.length}`);

    for (const cells of rows) {
      report.rowsRead++;
      if (handleRow(cells)) {
        report.accepted++;
      } else {
        report.skipped++;
      }
    }

    return this.finishReport(report);
  }

  /**
   * Open a report and classify the file; state stays 'loaded' only when
   * there is content to read
   */
  private startReport(source: EvidenceSourceName, filePath: string): SourceReport {
    const label = SOURCE_LABELS[source];
    const report: SourceReport = {
      source,
      filePath,
      state: 'loaded',
      rowsRead: 0,
      accepted: 0,
      skipped: 0,
    };

    logger.info(`Processing ${label} results...`);
    const fileState = inspectTabularFile(filePath);

    if (fileState === 'missing') {
      if (this.options.strictInputs) {
        throw new EvidenceSourceError(`${label} file not found: ${filePath}`, source, filePath);
      }
      logger.warn(`${label} file does not exist: ${filePath}`);
      report.state = 'missing';
    } else if (fileState === 'empty') {
      logger.info(`${label} file is empty (0 bytes) - no evidence from this source`);
      report.state = 'empty';
    }

    return report;
  }

  private finishReport(report: SourceReport): SourceReport {
    if (report.state === 'loaded') {
      logger.info(
        `Processed ${report.accepted} valid ${SOURCE_LABELS[report.source]} hits` +
          (report.skipped > 0 ? ` (${report.skipped} skipped)` : '')
      );
    }
    this.reports.push(report);
    return report;
  }

  private ensure(proteinId: string): ProteinEvidence {
    let evidence = this.proteins.get(proteinId);
    if (!evidence) {
      evidence = { proteinId };
      this.proteins.set(proteinId, evidence);
    }
    return evidence;
  }
}
