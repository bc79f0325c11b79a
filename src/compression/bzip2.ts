import { concatBytes } from '../binary.js';
import { CompressionError } from './errors.js';

const BLOCK_START = 0x314159265359;
const STREAM_END = 0x177245385090;
const SYMBOLS_PER_SELECTOR = 50;
const MAX_CODE_BITS = 20;
const RUN_A = 0;
const RUN_B = 1;

/**
 * Decode a complete bzip2 stream held in one sector. Output beyond
 * `capacity` bytes is rejected before it is produced.
 */
export function decompressBzip2(input: Uint8Array, capacity: number): Uint8Array {
  const blockLimit = readBlockLimit(input);
  const bits = new BitCursor(input, 4);
  const blocks: Uint8Array[] = [];
  let produced = 0;
  let streamCrc = 0;

  for (;;) {
    const marker = bits.u48();
    if (marker === STREAM_END) break;
    if (marker !== BLOCK_START) throw badData('Invalid bzip2 block header');

    const storedCrc = bits.u32();
    const block = decodeBlock(bits, blockLimit, capacity - produced);
    const crc = blockCrc(block);
    if (crc !== storedCrc) throw crcMismatch('BZip2 block CRC mismatch');
    streamCrc = (((streamCrc << 1) | (streamCrc >>> 31)) ^ crc) >>> 0;
    produced += block.length;
    blocks.push(block);
  }

  if (bits.u32() !== streamCrc) throw crcMismatch('BZip2 combined CRC mismatch');
  return blocks.length === 1 ? blocks[0]! : concatBytes(blocks);
}

function readBlockLimit(input: Uint8Array): number {
  if (input.length < 4) throw badData('Truncated bzip2 header');
  if (input[0] !== 0x42 || input[1] !== 0x5a || input[2] !== 0x68) {
    throw badData('Invalid bzip2 header');
  }
  const level = input[3]! - 0x30;
  if (level < 1 || level > 9) throw badData('Invalid bzip2 block size');
  return level * 100_000;
}

/** Most-significant-bit-first reader; running off the end is bad data. */
class BitCursor {
  private held = 0;
  private heldBits = 0;

  constructor(
    private readonly bytes: Uint8Array,
    private offset: number
  ) {}

  /** Up to 24 bits. */
  read(count: number): number {
    while (this.heldBits < count) {
      const byte = this.bytes[this.offset];
      if (byte === undefined) throw badData('Unexpected end of bzip2 stream');
      this.offset += 1;
      this.held = ((this.held << 8) | byte) >>> 0;
      this.heldBits += 8;
    }
    this.heldBits -= count;
    const value = (this.held >>> this.heldBits) & (2 ** count - 1);
    this.held &= 2 ** this.heldBits - 1;
    return value;
  }

  u32(): number {
    return this.read(16) * 0x10000 + this.read(16);
  }

  u48(): number {
    return this.read(24) * 0x1000000 + this.read(24);
  }
}

/** Canonical prefix code: code counts per length and symbols in code order. */
type PrefixCode = {
  counts: Uint16Array;
  symbols: Uint16Array;
  longest: number;
};

function decodeBlock(bits: BitCursor, blockLimit: number, room: number): Uint8Array {
  if (bits.read(1) !== 0) throw badData('Randomized bzip2 blocks are unsupported');
  const origin = bits.read(24);

  const alphabet = readSymbolMap(bits);
  if (alphabet.length === 0) throw badData('No symbols defined in bzip2 block');

  const groupCount = bits.read(3);
  if (groupCount < 2 || groupCount > 6) throw badData('Invalid bzip2 Huffman group count');
  const selectorCount = bits.read(15);
  if (selectorCount === 0) throw badData('Invalid bzip2 selector count');

  const selectors = readSelectors(bits, groupCount, selectorCount);
  const codes: PrefixCode[] = [];
  for (let group = 0; group < groupCount; group += 1) {
    codes.push(readPrefixCode(bits, alphabet.length + 2));
  }

  const transformed = readTransformedBlock(bits, alphabet, selectors, codes, blockLimit);
  if (origin >= transformed.length) throw badData('Invalid bzip2 block pointer');
  return expandRuns(undoBurrowsWheeler(transformed, origin), room);
}

/** Byte values present in the block, from the two-level 16x16 bitmap. */
function readSymbolMap(bits: BitCursor): number[] {
  const ranges = bits.read(16);
  const used: number[] = [];
  for (let range = 0; range < 16; range += 1) {
    if ((ranges & (0x8000 >>> range)) === 0) continue;
    const members = bits.read(16);
    for (let member = 0; member < 16; member += 1) {
      if ((members & (0x8000 >>> member)) !== 0) used.push(range * 16 + member);
    }
  }
  return used;
}

/** Selectors are unary move-to-front ranks over the table indices. */
function readSelectors(bits: BitCursor, groupCount: number, selectorCount: number): Uint8Array {
  const order = Array.from({ length: groupCount }, (_, index) => index);
  const selectors = new Uint8Array(selectorCount);
  for (let i = 0; i < selectorCount; i += 1) {
    let rank = 0;
    while (bits.read(1) === 1) {
      rank += 1;
      if (rank >= groupCount) throw badData('Invalid bzip2 selector');
    }
    const group = order[rank]!;
    order.copyWithin(1, 0, rank);
    order[0] = group;
    selectors[i] = group;
  }
  return selectors;
}

/** Code lengths are delta-coded from a 5-bit start. */
function readPrefixCode(bits: BitCursor, alphabetSize: number): PrefixCode {
  const lengths = new Uint8Array(alphabetSize);
  let length = bits.read(5);
  for (let symbol = 0; symbol < alphabetSize; symbol += 1) {
    for (;;) {
      if (length < 1 || length > MAX_CODE_BITS) throw badData('Invalid bzip2 code length');
      if (bits.read(1) === 0) break;
      length += bits.read(1) === 0 ? 1 : -1;
    }
    lengths[symbol] = length;
  }

  const counts = new Uint16Array(MAX_CODE_BITS + 1);
  let longest = 0;
  for (const bitLength of lengths) {
    counts[bitLength] = counts[bitLength]! + 1;
    if (bitLength > longest) longest = bitLength;
  }
  const next = new Uint16Array(MAX_CODE_BITS + 2);
  for (let bitLength = 1; bitLength <= MAX_CODE_BITS; bitLength += 1) {
    next[bitLength + 1] = next[bitLength]! + counts[bitLength]!;
  }
  const symbols = new Uint16Array(alphabetSize);
  lengths.forEach((bitLength, symbol) => {
    symbols[next[bitLength]!] = symbol;
    next[bitLength] = next[bitLength]! + 1;
  });
  return { counts, symbols, longest };
}

function decodeSymbol(bits: BitCursor, code: PrefixCode): number {
  let value = 0;
  let first = 0;
  let index = 0;
  for (let length = 1; length <= code.longest; length += 1) {
    value |= bits.read(1);
    const count = code.counts[length]!;
    if (value - first < count) return code.symbols[index + value - first]!;
    index += count;
    first = (first + count) << 1;
    value <<= 1;
  }
  throw badData('Invalid bzip2 Huffman code');
}

/** Huffman and move-to-front stages, with RUNA/RUNB zero runs. */
function readTransformedBlock(
  bits: BitCursor,
  alphabet: number[],
  selectors: Uint8Array,
  codes: PrefixCode[],
  blockLimit: number
): Uint8Array {
  const block = new Uint8Array(blockLimit);
  const recent = alphabet.slice();
  const endOfBlock = alphabet.length + 1;
  let length = 0;
  let run = 0;
  let runWeight = 1;
  let selector = 0;
  let left = 0;
  let code = codes[0]!;

  for (;;) {
    if (left === 0) {
      if (selector >= selectors.length) throw badData('Selector index out of range');
      code = codes[selectors[selector]!]!;
      selector += 1;
      left = SYMBOLS_PER_SELECTOR;
    }
    left -= 1;

    const symbol = decodeSymbol(bits, code);
    if (symbol === RUN_A || symbol === RUN_B) {
      run += symbol === RUN_A ? runWeight : runWeight * 2;
      runWeight *= 2;
      if (length + run > blockLimit) throw badData('BZip2 block exceeds maximum size');
      continue;
    }
    if (run > 0) {
      block.fill(recent[0]!, length, length + run);
      length += run;
      run = 0;
      runWeight = 1;
    }
    if (symbol === endOfBlock) return block.subarray(0, length);

    if (length >= blockLimit) throw badData('BZip2 block exceeds maximum size');
    const rank = symbol - 1;
    const value = recent[rank]!;
    recent.copyWithin(1, 0, rank);
    recent[0] = value;
    block[length] = value;
    length += 1;
  }
}

function undoBurrowsWheeler(last: Uint8Array, origin: number): Uint8Array {
  const starts = new Uint32Array(256);
  for (const byte of last) starts[byte] = starts[byte]! + 1;
  let total = 0;
  for (let byte = 0; byte < 256; byte += 1) {
    const count = starts[byte]!;
    starts[byte] = total;
    total += count;
  }

  const links = new Uint32Array(last.length);
  last.forEach((byte, index) => {
    links[starts[byte]!] = index;
    starts[byte] = starts[byte]! + 1;
  });

  const out = new Uint8Array(last.length);
  let at = links[origin]!;
  for (let i = 0; i < out.length; i += 1) {
    out[i] = last[at]!;
    at = links[at]!;
  }
  return out;
}

/** Runs of four equal bytes carry a repeat count in the byte after them. */
function* runsOf(data: Uint8Array): Generator<readonly [value: number, count: number]> {
  let at = 0;
  while (at < data.length) {
    const value = data[at]!;
    let count = 1;
    while (count < 4 && data[at + count] === value) count += 1;
    at += count;
    if (count === 4) {
      const extra = data[at];
      if (extra === undefined) throw badData('Truncated bzip2 RLE data');
      count += extra;
      at += 1;
    }
    yield [value, count];
  }
}

function expandRuns(data: Uint8Array, room: number): Uint8Array {
  let size = 0;
  for (const [, count] of runsOf(data)) {
    size += count;
    if (size > room) throw overCapacity(room);
  }
  const out = new Uint8Array(size);
  let at = 0;
  for (const [value, count] of runsOf(data)) {
    out.fill(value, at, at + count);
    at += count;
  }
  return out;
}

let crcTable: Uint32Array | undefined;

function blockCrc(data: Uint8Array): number {
  const table = (crcTable ??= buildCrcTable());
  let crc = 0xffffffff;
  for (const byte of data) {
    crc = ((crc << 8) ^ table[(crc >>> 24) ^ byte]!) >>> 0;
  }
  return ~crc >>> 0;
}

/** CRC-32 with polynomial 0x04c11db7, most significant bit first. */
function buildCrcTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let byte = 0; byte < 256; byte += 1) {
    let crc = byte << 24;
    for (let bit = 0; bit < 8; bit += 1) {
      crc = crc & 0x80000000 ? (crc << 1) ^ 0x04c11db7 : crc << 1;
    }
    table[byte] = crc >>> 0;
  }
  return table;
}

function overCapacity(capacity: number): CompressionError {
  return new CompressionError('COMPRESSION_RESOURCE_LIMIT', 'BZip2 output exceeds the sector capacity', {
    algorithm: 'bzip2',
    context: { capacity: String(capacity) }
  });
}

function crcMismatch(message: string): CompressionError {
  return new CompressionError('COMPRESSION_BZIP2_CRC_MISMATCH', message, { algorithm: 'bzip2' });
}

function badData(message: string): CompressionError {
  return new CompressionError('COMPRESSION_BZIP2_BAD_DATA', message, { algorithm: 'bzip2' });
}
