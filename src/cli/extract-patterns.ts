#!/usr/bin/env node

/**
 * Extract unique patterns of unresolved defence gene annotations for manual curation
 *
 * Usage:
 *   extract-unresolved-patterns --consensus-dir 05_consensus/ --output unresolved_patterns.csv
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { loadAndValidateConfig } from '../config/index.js';
import { UsageError, describeError } from '../errors.js';
import { PatternExtractor, type UnresolvedPattern } from '../curation/PatternExtractor.js';
import { logger } from '../utils/logger.js';

export interface ExtractPatternsArgs {
  consensusDir: string;
  output: string;
}

export const DEFAULT_CURATION_OUTPUT = 'unresolved_patterns.csv';

const USAGE = 'Usage: extract-unresolved-patterns --consensus-dir DIR [--output FILE]';

export function parseArgs(argv: string[]): ExtractPatternsArgs {
  let consensusDir: string | undefined;
  let output = DEFAULT_CURATION_OUTPUT;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--consensus-dir' && i + 1 < argv.length) {
      consensusDir = argv[++i];
    } else if (arg === '--output' && i + 1 < argv.length) {
      output = argv[++i];
    } else {
      throw new UsageError(`Unexpected argument: ${arg}\n${USAGE}`);
    }
  }

  if (!consensusDir) {
    throw new UsageError(`Missing required argument: --consensus-dir\n${USAGE}`);
  }

  return { consensusDir, output };
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}

/**
 * One line per pattern for the "most common" listing
 */
export function describePattern(pattern: UnresolvedPattern, rank: number): string {
  return (
    `${String(rank).padStart(2)}. n=${String(pattern.proteinIds.length).padStart(4)} ` +
    `genomes=${String(pattern.genomeIds.length).padStart(3)}  ` +
    `PADLOC:${pad(pattern.padloc, 15)} DF:${pad(pattern.defenseFinder, 15)} ` +
    `Fwd:${pad(pattern.forwardBlast, 15)} Rev:${pad(pattern.reverseBlast, 15)}`
  );
}

export function main(argv: string[] = process.argv.slice(2)): number {
  try {
    const config = loadAndValidateConfig();
    const args = parseArgs(argv);

    console.log('='.repeat(70));
    console.log('EXTRACTING UNRESOLVED DEFENCE GENE PATTERNS');
    console.log('='.repeat(70));

    const extractor = new PatternExtractor({ exampleLimit: config.curation.exampleLimit });
    const outcome = extractor.extract(args.consensusDir);

    if (outcome.kind === 'nothing-to-curate') {
      console.log('');
      console.log(
        outcome.reason === 'no-profiles'
          ? `Nothing to curate: no defence profile files found in ${args.consensusDir}`
          : 'Nothing to curate: no MAPPING or CONFLICT genes found in any profile'
      );
      return 0;
    }

    extractor.writeCurationTemplate(args.output, outcome.rows);

    console.log(`Total problematic proteins: ${outcome.totalProteins}`);
    for (const { status, count } of outcome.statusBreakdown) {
      console.log(`  ${status}: ${count}`);
    }
    console.log(`Unique patterns to review: ${outcome.patterns.length}`);
    console.log(`\nTop ${config.curation.topPatterns} most common patterns:`);
    console.log('-'.repeat(70));
    outcome.patterns.slice(0, config.curation.topPatterns).forEach((pattern, index) => {
      console.log(describePattern(pattern, index + 1));
    });

    console.log('');
    console.log(`Next: open ${args.output} and fill in TYPE, SUBTYPE and OUTCOME for each pattern.`);
    console.log("Use 'type_unresolved', 'subtype_unresolved' or 'outcome_unresolved' when a value");
    console.log("cannot be decided; these differ from 'Unknown', which a tool reported itself.");

    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(describeError(error));
    } else {
      logger.error('Failed to extract unresolved patterns', error);
    }
    return 1;
  }
}

const isMainModule = (): boolean =>
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMainModule()) {
  process.exitCode = main();
}
