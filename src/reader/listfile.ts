import { decodeUtf8, encodeUtf8 } from '../binary.js';
import { foldName } from '../crypto/hash.js';

/** Name of the internal file listing the archive's other file names. */
export const LISTFILE_NAME = '(listfile)';
/** Internal files whose names are known without a listfile. */
export const INTERNAL_FILE_NAMES = Object.freeze([LISTFILE_NAME, '(attributes)', '(signature)']);

/**
 * Names listed in a `(listfile)`. Lines may end in CRLF or LF, and some
 * writers separate names with `;`. Names that fold to the same hash-table
 * spelling are listed once, under their first spelling.
 */
export function parseListfile(bytes: Uint8Array): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const line of decodeUtf8(bytes).split(/[\r\n;]+/)) {
    const name = line.trim();
    if (name.length === 0) continue;
    const key = foldName(name);
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }
  return names;
}

export function buildListfile(names: Iterable<string>): Uint8Array {
  let text = '';
  for (const name of names) text += `${name}\r\n`;
  return encodeUtf8(text);
}
