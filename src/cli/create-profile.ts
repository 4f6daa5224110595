#!/usr/bin/env node

/**
 * Create a genome's defence profile directly from the raw tool outputs
 *
 * Usage:
 *   create-defence-profile \
 *     --padloc 1004153.3_padloc.csv \
 *     --defensefinder 1004153.3_defense_finder_genes.tsv \
 *     --forward-blast 1004153.3_vs_ref_forward_best.txt \
 *     --reverse-blast 1004153.3_vs_ref_reverse_best.txt \
 *     --master-key MASTER_ToolKey.tsv \
 *     --output 1004153.3_defenceprofile.csv
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { loadAndValidateConfig, defaultProfilePath, genomeIdFromPadlocFile } from '../config/index.js';
import { UsageError, describeError } from '../errors.js';
import type { EvidenceFiles } from '../evidence/EvidenceAggregator.js';
import { MappingTable } from '../mapping/MappingTable.js';
import { DefenceProfilePipeline } from '../pipeline/DefenceProfilePipeline.js';
import { formatProfileSummary } from '../profile/profileSummary.js';
import { logger } from '../utils/logger.js';

export interface CreateProfileArgs {
  files: EvidenceFiles;
  masterKey?: string;
  output?: string;
}

const USAGE = `Usage: create-defence-profile --padloc FILE --defensefinder FILE \\
  --forward-blast FILE --reverse-blast FILE [--master-key FILE] [--output FILE]`;

const KNOWN_FLAGS = [
  '--padloc',
  '--defensefinder',
  '--forward-blast',
  '--reverse-blast',
  '--master-key',
  '--output',
];

/**
 * Parse command line arguments
 * @throws UsageError when a required argument is missing
 */
export function parseArgs(argv: string[]): CreateProfileArgs {
  const values: Record<string, string> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (KNOWN_FLAGS.includes(arg) && i + 1 < argv.length) {
      values[arg.slice(2)] = argv[++i];
    } else {
      throw new UsageError(`Unexpected argument: ${arg}\n${USAGE}`);
    }
  }

  const required = ['padloc', 'defensefinder', 'forward-blast', 'reverse-blast'];
  const missing = required.filter((name) => !values[name]);
  if (missing.length > 0) {
    throw new UsageError(
      `Missing required arguments: ${missing.map((name) => `--${name}`).join(', ')}\n${USAGE}`
    );
  }

  return {
    files: {
      padloc: values['padloc'],
      defenseFinder: values['defensefinder'],
      forwardBlast: values['forward-blast'],
      reverseBlast: values['reverse-blast'],
    },
    masterKey: values['master-key'],
    output: values['output'],
  };
}

/**
 * Run the CLI and return the process exit code
 */
export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const config = loadAndValidateConfig();
    const args = parseArgs(argv);

    const masterKey = args.masterKey ?? config.masterKeyPath;
    if (!masterKey) {
      throw new UsageError(`No mapping table: pass --master-key or set DEFENCE_MASTER_KEY\n${USAGE}`);
    }

    const outputPath = args.output ?? defaultProfilePath(args.files.padloc);

    console.log('=== Creating Defence Profile (Direct from Raw Outputs) ===');
    console.log(`Genome ID: ${genomeIdFromPadlocFile(args.files.padloc)}`);
    console.log(`Output file: ${outputPath}`);

    const mappingTable = MappingTable.load(masterKey);
    // Paths named on the command line must exist; empty files still mean "no evidence"
    const pipeline = new DefenceProfilePipeline(mappingTable, {
      blastFilter: config.blastFilter,
      strictInputs: true,
    });

    const { summary } = pipeline.runAndWrite(args.files, outputPath);

    console.log('');
    for (const line of formatProfileSummary(summary)) {
      console.log(line);
    }

    if (summary.sample.length > 0) {
      console.log('\nSAMPLE RESULTS (first 5 entries):');
      for (const row of summary.sample) {
        console.log(
          `  ${row.protein_id}  ${row.status}  ${row.final_consensus}  ` +
            `(PADLOC: ${row.padloc_original}, DefenseFinder: ${row.deffind_original})`
        );
      }
    }

    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(describeError(error));
    } else {
      logger.error('Failed to create defence profile', error);
    }
    return 1;
  }
}

const isMainModule = (): boolean =>
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule()) {
  process.exitCode = main();
}
