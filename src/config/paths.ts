import path from 'path';

/**
 * File name suffix shared by the profile writer and the pattern extractor
 */
export const PROFILE_SUFFIX = '_defenceprofile.csv';

/**
 * Derive the genome identifier from a PADLOC output file name
 * e.g. /data/1004153.3_padloc.csv -> 1004153.3
 */
export function genomeIdFromPadlocFile(padlocPath: string): string {
  const stem = path.basename(padlocPath, path.extname(padlocPath));
  return stem.replace('_padloc', '');
}

/**
 * Resolve the profile path used when no --output is given
 * @param padlocPath PADLOC output the genome id is taken from
 * @param directory Directory to place the profile in (defaults to cwd)
 */
export function defaultProfilePath(padlocPath: string, directory?: string): string {
  const fileName = `${genomeIdFromPadlocFile(padlocPath)}${PROFILE_SUFFIX}`;
  return directory ? path.join(directory, fileName) : fileName;
}
