export { MpqReader } from './reader/MpqReader.js';
export type { MpqEntry, MpqReadOptions, MpqReaderOptions } from './reader/MpqReader.js';
export { MpqWriter } from './writer/MpqWriter.js';
export type { MpqAddOptions, MpqWriterOptions } from './writer/MpqWriter.js';
export { BufferRandomAccess } from './reader/RandomAccess.js';
export type { RandomAccess } from './reader/RandomAccess.js';
export { WebWritableSink } from './writer/Sink.js';
export type { Sink } from './writer/Sink.js';

export { MpqError, MPQ_REPORT_SCHEMA_VERSION } from './errors.js';
export type { MpqErrorCode, MpqWarning, MpqWarningCode } from './errors.js';
export { AGENT_RESOURCE_LIMITS, DEFAULT_RESOURCE_LIMITS } from './limits.js';
export type { MpqProfile, ResourceLimits } from './limits.js';

export {
  HEADER_SIZES,
  MpqFormat,
  createHeader,
  getArchiveSize,
  getSectorSize,
  mergeHighBits,
  parseHeader,
  serializeHeader,
  splitHighBits
} from './header.js';
export type {
  MpqBasicHeader,
  MpqExtendedHeader,
  MpqExtendedV1Header,
  MpqExtendedV2Header,
  MpqExtendedV3Header,
  MpqFormatVersion,
  MpqHeader
} from './header.js';
export { BlockTable, MpqFileFlags } from './tables/blockTable.js';
export type { BlockEntry } from './tables/blockTable.js';
export { HashTable, LOCALE_NEUTRAL, PLATFORM_DEFAULT } from './tables/hashTable.js';
export type { HashKey, HashSlot } from './tables/hashTable.js';
export { BLOCK_TABLE_KEY, HASH_TABLE_KEY, MpqHashType, hashName } from './crypto/hash.js';
export { decryptBlock, deriveFileKey, encryptBlock } from './crypto/cipher.js';
export { LISTFILE_NAME, buildListfile, parseListfile } from './reader/listfile.js';

export * from './compression/index.js';
