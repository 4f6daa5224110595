/**
 * Defence Profile Pipeline
 *
 * Runs one genome end to end: aggregate evidence, decide consensus per
 * protein, classify, write the profile. Genomes share nothing but the
 * read-only mapping table.
 */

import { ClassificationResolver } from '../classification/ClassificationResolver.js';
import { DEFAULT_BLAST_FILTER, type BlastFilterBounds } from '../config/index.js';
import { ConsensusEngine } from '../consensus/ConsensusEngine.js';
import { formatFinalCall } from '../consensus/CompositeName.js';
import {
  EvidenceAggregator,
  type EvidenceFiles,
} from '../evidence/EvidenceAggregator.js';
import type { MappingTable } from '../mapping/MappingTable.js';
import { buildProfileRow, writeProfile, type ProfileRow } from '../profile/ProfileWriter.js';
import {
  emptyStatusCounts,
  summarizeProfile,
  type ProfileSummary,
} from '../profile/profileSummary.js';
import type { SourceReport } from '../types/evidence.js';
import { logger } from '../utils/logger.js';

export interface PipelineOptions {
  blastFilter?: BlastFilterBounds;
  strictInputs?: boolean;
}

export interface ProfileRunResult {
  rows: ProfileRow[];
  summary: ProfileSummary;
  sources: SourceReport[];
}

export class DefenceProfilePipeline {
  private readonly engine: ConsensusEngine;
  private readonly resolver: ClassificationResolver;

  constructor(
    private readonly mappingTable: MappingTable,
    private readonly options: PipelineOptions = {}
  ) {
    this.engine = new ConsensusEngine({ blastFilter: options.blastFilter ?? DEFAULT_BLAST_FILTER });
    this.resolver = new ClassificationResolver(mappingTable);
  }

  /**
   * Build the profile rows for one genome without writing anything
   */
  run(files: EvidenceFiles): ProfileRunResult {
    const aggregator = new EvidenceAggregator(this.mappingTable, {
      strictInputs: this.options.strictInputs,
    });
    const { proteins, reports } = aggregator.aggregate(files);

    logger.info(`Determining final consensus for ${proteins.size} proteins`);

    const statusCounts = emptyStatusCounts();
    const rows: ProfileRow[] = [];
    const proteinIds = [...proteins.keys()].sort();

    for (const proteinId of proteinIds) {
      const evidence = proteins.get(proteinId);
      if (!evidence) continue;

      const result = this.engine.decide(evidence);
      statusCounts[result.status]++;

      if (result.finalCall === undefined) {
        logger.debug(`${proteinId}: ${result.status} (${result.explanation})`);
        continue;
      }

      const finalConsensus = formatFinalCall(result.finalCall);
      rows.push(
        buildProfileRow(
          evidence,
          result.status,
          finalConsensus,
          result.explanation,
          this.resolver.classify(result.finalCall)
        )
      );

      if (result.status === 'RESOLVED' || result.status === 'CONFLICT' || result.status === 'BLAST') {
        logger.info(`  ${proteinId}: ${result.status} -> ${finalConsensus}`);
      }
    }

    return {
      rows,
      summary: summarizeProfile(statusCounts, rows),
      sources: reports,
    };
  }

  /**
   * Build and write the profile for one genome
   */
  runAndWrite(files: EvidenceFiles, outputPath: string): ProfileRunResult {
    const result = this.run(files);
    writeProfile(outputPath, result.rows);
    return result;
  }
}
