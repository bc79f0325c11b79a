const CRYPT_TABLE_SIZE = 0x500;
const CRYPT_TABLE_SEED = 0x00100001;

let table: Uint32Array | null = null;

/**
 * The 0x500-entry table shared by name hashing and the block cipher.
 *
 * Entry `i + 0x100 * j` is produced by the `j`-th step of the generator for
 * row `i`, so the table is filled column by column. Built on first use and
 * never mutated afterwards.
 */
export function getCryptTable(): Uint32Array {
  if (table) return table;
  const built = new Uint32Array(CRYPT_TABLE_SIZE);
  let seed = CRYPT_TABLE_SEED;
  for (let row = 0; row < 0x100; row += 1) {
    for (let step = 0, index = row; step < 5; step += 1, index += 0x100) {
      seed = (seed * 125 + 3) % 0x2aaaab;
      const high = (seed & 0xffff) << 16;
      seed = (seed * 125 + 3) % 0x2aaaab;
      const low = seed & 0xffff;
      built[index] = (high | low) >>> 0;
    }
  }
  table = built;
  return built;
}
