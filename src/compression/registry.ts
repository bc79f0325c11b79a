import { BZIP2_CODEC, PKWARE_CODEC, SPARSE_CODEC, ZLIB_CODEC } from './codecs.js';
import type { MpqCompressionCodec } from './types.js';

const codecs = new Map<number, MpqCompressionCodec>();
let builtinsRegistered = false;

/** Register a codec for a compression mask bit, replacing any earlier one. */
export function registerCompressionCodec(codec: MpqCompressionCodec): void {
  codecs.set(codec.mask, codec);
}

/** Look up the codec registered for a compression mask bit. */
export function getCompressionCodec(mask: number): MpqCompressionCodec | undefined {
  return codecs.get(mask);
}

/** List all registered codecs. */
export function listCompressionCodecs(): MpqCompressionCodec[] {
  return [...codecs.values()];
}

function registerBuiltins(): void {
  if (builtinsRegistered) return;
  builtinsRegistered = true;
  registerCompressionCodec(ZLIB_CODEC);
  registerCompressionCodec(BZIP2_CODEC);
  registerCompressionCodec(PKWARE_CODEC);
  registerCompressionCodec(SPARSE_CODEC);
}

registerBuiltins();
