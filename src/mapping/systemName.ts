/**
 * Names that legitimately end in `_1` (or look like they do)
 */
export const SUFFIX_EXCEPTIONS: ReadonlySet<string> = new Set(['DISARM_1', 'PD-T7-5_1', 'GAO_19']);

/**
 * Tools report the first/only variant of a system as `<name>_1`.
 * Strip that marker so it is not read as a separate subtype.
 */
export function normalizeSystemName(
  name: string,
  exceptions: ReadonlySet<string> = SUFFIX_EXCEPTIONS
): string {
  if (exceptions.has(name)) {
    return name;
  }
  if (name.endsWith('_1')) {
    return name.slice(0, -2);
  }
  return name;
}

/**
 * Pull the system name out of a BLAST identifier (`locus#system_1`)
 * Identifiers without a `#` are returned as they are
 */
export function systemFromBlastId(blastId: string): string {
  if (!blastId.includes('#')) {
    return blastId;
  }
  return normalizeSystemName(blastId.split('#')[1]);
}
