import { describe, it, expect } from 'vitest';
import path from 'path';
import { defaultProfilePath, genomeIdFromPadlocFile } from '../paths.js';

describe('paths', () => {
  it('derives the genome id from a PADLOC file name', () => {
    expect(genomeIdFromPadlocFile('/data/1004153.3_padloc.csv')).toBe('1004153.3');
    expect(genomeIdFromPadlocFile('genomeA.csv')).toBe('genomeA');
  });

  it('names the default profile after the genome', () => {
    expect(defaultProfilePath('/data/1004153.3_padloc.csv')).toBe('1004153.3_defenceprofile.csv');
    expect(defaultProfilePath('/data/1004153.3_padloc.csv', '/out')).toBe(
      path.join('/out', '1004153.3_defenceprofile.csv')
    );
  });
});
