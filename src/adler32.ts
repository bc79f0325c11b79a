const MOD_ADLER = 65521;
// Largest run of bytes whose sums cannot overflow before the modulo.
const NMAX = 5552;

export class Adler32 {
  private a: number;
  private b: number;

  constructor(seed = 1) {
    this.a = seed & 0xffff;
    this.b = (seed >>> 16) & 0xffff;
  }

  update(chunk: Uint8Array): void {
    let a = this.a;
    let b = this.b;
    for (let start = 0; start < chunk.length; start += NMAX) {
      const end = Math.min(chunk.length, start + NMAX);
      for (let i = start; i < end; i += 1) {
        a += chunk[i]!;
        b += a;
      }
      a %= MOD_ADLER;
      b %= MOD_ADLER;
    }
    this.a = a;
    this.b = b;
  }

  digest(): number {
    return ((this.b << 16) | this.a) >>> 0;
  }
}

/** Adler-32 of `chunk`. Sector checksums in MPQ archives start from seed 0, not 1. */
export function adler32(chunk: Uint8Array, seed = 1): number {
  const hasher = new Adler32(seed);
  hasher.update(chunk);
  return hasher.digest();
}
