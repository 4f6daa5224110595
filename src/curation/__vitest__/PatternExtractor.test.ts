import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import {
  PatternExtractor,
  CURATION_COLUMNS,
  formatExampleProteins,
  genomeIdFromProteinId,
} from '../PatternExtractor.js';
import { CurationInputError } from '../../errors.js';
import { readHeaderedTable } from '../../io/tabular.js';

const HEADER = 'protein_id,padloc_original,deffind_original,fwd_blast,rev_blast,status';

describe('PatternExtractor', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'curation-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeProfile(name: string, lines: string[]): void {
    fs.writeFileSync(path.join(dir, name), [HEADER, ...lines].join('\n') + '\n');
  }

  function writeTwoGenomes(): void {
    writeProfile('g1_defenceprofile.csv', [
      'g1@p1,X,No_hit,SysF,No_hit,MAPPING',
      'g1@p2,X,No_hit,"SysF(95.0%, E=1.0e-50, L=300, Q=300, S=305)",No_hit,MAPPING',
      'g1@p3,SubA,SubB,No_hit,No_hit,CONFLICT',
      'g1@p4,gabija,Gabija,No_hit,No_hit,AGREE',
    ]);
    writeProfile('g2_defenceprofile.csv', [
      'g2@p2,X,,SysF,No_hit,MAPPING',
      'g2@p5,SubA,SubB,No_hit,No_hit,CONFLICT',
    ]);
    fs.writeFileSync(path.join(dir, 'notes.csv'), `${HEADER}\ng9@p1,X,No_hit,No_hit,No_hit,MAPPING\n`);
  }

  it('lists profile files sorted by name', () => {
    writeTwoGenomes();

    expect(new PatternExtractor().findProfileFiles(dir)).toEqual([
      path.join(dir, 'g1_defenceprofile.csv'),
      path.join(dir, 'g2_defenceprofile.csv'),
    ]);
  });

  it('groups unresolved proteins across genomes by their evidence', () => {
    writeTwoGenomes();

    const outcome = new PatternExtractor().extract(dir);

    expect(outcome.kind).toBe('patterns');
    if (outcome.kind !== 'patterns') return;

    expect(outcome.profilesRead).toBe(2);
    expect(outcome.totalProteins).toBe(5);
    expect(outcome.statusBreakdown).toEqual([
      { status: 'MAPPING', count: 3 },
      { status: 'CONFLICT', count: 2 },
    ]);
    expect(outcome.patterns).toEqual([
      {
        padloc: 'X',
        defenseFinder: 'No_hit',
        forwardBlast: 'SysF',
        reverseBlast: 'No_hit',
        proteinIds: ['g1@p1', 'g1@p2', 'g2@p2'],
        genomeIds: ['g1', 'g2'],
      },
      {
        padloc: 'SubA',
        defenseFinder: 'SubB',
        forwardBlast: 'No_hit',
        reverseBlast: 'No_hit',
        proteinIds: ['g1@p3', 'g2@p5'],
        genomeIds: ['g1', 'g2'],
      },
    ]);
    expect(outcome.rows[0]).toEqual({
      PADLOC: 'X',
      DefenseFinder: 'No_hit',
      BLAST_fwd: 'SysF',
      BLAST_rev: 'No_hit',
      protein_count: 3,
      example_proteins: 'g1@p1, g1@p2, g2@p2',
      TYPE: '',
      SUBTYPE: '',
      OUTCOME: '',
    });
  });

  it('limits the example proteins it lists', () => {
    writeTwoGenomes();

    const outcome = new PatternExtractor({ exampleLimit: 2 }).extract(dir);

    expect(outcome.kind === 'patterns' && outcome.rows[0].example_proteins).toBe(
      'g1@p1, g1@p2, ... (1 more)'
    );
  });

  it('writes a curation template that reads back', () => {
    writeTwoGenomes();
    const extractor = new PatternExtractor();
    const outcome = extractor.extract(dir);
    const output = path.join(dir, 'unresolved_patterns.csv');

    extractor.writeCurationTemplate(output, outcome.kind === 'patterns' ? outcome.rows : []);

    const table = readHeaderedTable(output);
    expect(table.columns).toEqual([...CURATION_COLUMNS]);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0]).toMatchObject({
      PADLOC: 'X',
      protein_count: '3',
      example_proteins: 'g1@p1, g1@p2, g2@p2',
      TYPE: '',
    });
  });

  it('reports nothing to curate for a directory without profiles', () => {
    expect(new PatternExtractor().extract(dir)).toEqual({
      kind: 'nothing-to-curate',
      reason: 'no-profiles',
      profilesRead: 0,
    });
  });

  it('reports nothing to curate when every profile is clean', () => {
    writeProfile('g1_defenceprofile.csv', ['g1@p4,gabija,Gabija,No_hit,No_hit,AGREE']);
    writeProfile('g2_defenceprofile.csv', []);

    expect(new PatternExtractor().extract(dir)).toEqual({
      kind: 'nothing-to-curate',
      reason: 'no-unresolved',
      profilesRead: 2,
    });
  });

  it('skips profiles without a status column', () => {
    fs.writeFileSync(path.join(dir, 'g1_defenceprofile.csv'), 'protein_id,padloc_original\ng1@p1,X\n');

    expect(new PatternExtractor().loadUnresolvedRows(path.join(dir, 'g1_defenceprofile.csv'))).toBeUndefined();
    expect(new PatternExtractor().extract(dir)).toEqual({
      kind: 'nothing-to-curate',
      reason: 'no-profiles',
      profilesRead: 0,
    });
  });

  it('fails when the directory does not exist', () => {
    expect(() => new PatternExtractor().extract(path.join(dir, 'absent'))).toThrow(CurationInputError);
  });
});

describe('formatExampleProteins', () => {
  it('lists all ids when within the limit', () => {
    expect(formatExampleProteins(['a', 'b'])).toBe('a, b');
  });

  it('notes how many ids were left out', () => {
    expect(formatExampleProteins(['a', 'b', 'c', 'd', 'e', 'f', 'g'])).toBe('a, b, c, d, e, ... (2 more)');
  });
});

describe('genomeIdFromProteinId', () => {
  it('takes the part before @', () => {
    expect(genomeIdFromProteinId('1004153.3@locus_0042')).toBe('1004153.3');
    expect(genomeIdFromProteinId('orphan')).toBe('orphan');
  });
});
