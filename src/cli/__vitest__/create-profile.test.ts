import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import { main, parseArgs } from '../create-profile.js';
import { UsageError } from '../../errors.js';

describe('create-defence-profile CLI', () => {
  let dir: string;
  let originalProcessEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalProcessEnv = { ...process.env };
    delete process.env.DEFENCE_MASTER_KEY;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'create-profile-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalProcessEnv;
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const evidenceArgs = (): string[] => [
    '--padloc',
    path.join(dir, 'g1_padloc.csv'),
    '--defensefinder',
    path.join(dir, 'g1_defense_finder_genes.tsv'),
    '--forward-blast',
    path.join(dir, 'g1_forward.txt'),
    '--reverse-blast',
    path.join(dir, 'g1_reverse.txt'),
  ];

  describe('parseArgs', () => {
    it('parses all evidence paths and options', () => {
      expect(parseArgs([...evidenceArgs(), '--master-key', 'key.tsv', '--output', 'out.csv'])).toEqual({
        files: {
          padloc: path.join(dir, 'g1_padloc.csv'),
          defenseFinder: path.join(dir, 'g1_defense_finder_genes.tsv'),
          forwardBlast: path.join(dir, 'g1_forward.txt'),
          reverseBlast: path.join(dir, 'g1_reverse.txt'),
        },
        masterKey: 'key.tsv',
        output: 'out.csv',
      });
    });

    it('requires every evidence source', () => {
      expect(() => parseArgs(['--padloc', 'g1_padloc.csv'])).toThrow(
        'Missing required arguments: --defensefinder, --forward-blast, --reverse-blast'
      );
    });

    it('rejects unknown flags and flags without a value', () => {
      expect(() => parseArgs(['--verbose'])).toThrow(UsageError);
      expect(() => parseArgs([...evidenceArgs(), '--output'])).toThrow('Unexpected argument: --output');
    });
  });

  describe('main', () => {
    beforeEach(() => {
      fs.writeFileSync(
        path.join(dir, 'master.tsv'),
        'PADLOC_systems\tDefenseFinder_subtypes\tNovel_subtypes\tNovel_types\tDefense_outcome\n' +
          'gabija\tGabija\tGabija\tGabija\tDegradation\n'
      );
      fs.writeFileSync(path.join(dir, 'g1_padloc.csv'), 'target.name,system\ng1@a,gabija\n');
      fs.writeFileSync(path.join(dir, 'g1_defense_finder_genes.tsv'), 'hit_id\tsubtype\ng1@a\tGabija\n');
      fs.writeFileSync(path.join(dir, 'g1_forward.txt'), '');
      fs.writeFileSync(path.join(dir, 'g1_reverse.txt'), '');
    });

    it('writes the profile and exits cleanly', () => {
      const output = path.join(dir, 'g1_defenceprofile.csv');

      const code = main([...evidenceArgs(), '--master-key', path.join(dir, 'master.tsv'), '--output', output]);

      expect(code).toBe(0);
      const lines = fs.readFileSync(output, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(lines[1]).toBe(
        'g1@a,gabija,Gabija,Gabija,Gabija,No_hit,No_hit,AGREE,Gabija,Both tools agree on consensus,' +
          'Gabija,Gabija,Degradation'
      );
      expect(console.log).toHaveBeenCalledWith('Genome ID: g1');
    });

    it('fails when a named evidence file does not exist', () => {
      const output = path.join(dir, 'typo_defenceprofile.csv');
      const argv = [
        '--padloc',
        path.join(dir, 'g1_padloc.csv'),
        '--defensefinder',
        path.join(dir, 'g1_defense_finder_gens.tsv'),
        '--forward-blast',
        path.join(dir, 'g1_forward.txt'),
        '--reverse-blast',
        path.join(dir, 'g1_reverse.txt'),
        '--master-key',
        path.join(dir, 'master.tsv'),
        '--output',
        output,
      ];

      expect(main(argv)).toBe(1);
      expect(fs.existsSync(output)).toBe(false);
    });

    it('fails when a search output path does not exist', () => {
      fs.rmSync(path.join(dir, 'g1_reverse.txt'));
      const output = path.join(dir, 'typo_defenceprofile.csv');

      expect(main([...evidenceArgs(), '--master-key', path.join(dir, 'master.tsv'), '--output', output])).toBe(1);
      expect(fs.existsSync(output)).toBe(false);
    });

    it('takes the mapping table from the environment', () => {
      process.env.DEFENCE_MASTER_KEY = path.join(dir, 'master.tsv');
      const output = path.join(dir, 'env_defenceprofile.csv');

      expect(main([...evidenceArgs(), '--output', output])).toBe(0);
      expect(fs.existsSync(output)).toBe(true);
    });

    it('fails without a mapping table', () => {
      expect(main(evidenceArgs())).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining('No mapping table: pass --master-key or set DEFENCE_MASTER_KEY')
      );
    });

    it('fails when the mapping table cannot be read', () => {
      const output = path.join(dir, 'never_defenceprofile.csv');

      expect(main([...evidenceArgs(), '--master-key', path.join(dir, 'absent.tsv'), '--output', output])).toBe(1);
      expect(fs.existsSync(output)).toBe(false);
    });
  });
});
