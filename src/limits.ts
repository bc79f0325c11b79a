/** Resource ceilings applied while opening archives and extracting files. */
export type ResourceLimits = {
  maxHashTableEntries?: number;
  maxBlockTableEntries?: number;
  maxFileBytes?: number;
  maxCompressionRatio?: number;
  maxSectorSizeShift?: number;
  maxHeaderSearchBytes?: number;
};

/** Safety profile for open and extract behavior. */
export type MpqProfile = 'compat' | 'strict' | 'agent';

const DEFAULT_LIMITS = Object.freeze({
  maxHashTableEntries: 1 << 20,
  maxBlockTableEntries: 1 << 20,
  maxFileBytes: 512 * 1024 * 1024,
  maxCompressionRatio: 1000,
  maxSectorSizeShift: 16,
  maxHeaderSearchBytes: 64 * 1024 * 1024
} satisfies Required<ResourceLimits>);

const AGENT_LIMITS = Object.freeze({
  maxHashTableEntries: 1 << 18,
  maxBlockTableEntries: 1 << 18,
  maxFileBytes: 128 * 1024 * 1024,
  maxCompressionRatio: 200,
  maxSectorSizeShift: 12,
  maxHeaderSearchBytes: 16 * 1024 * 1024
} satisfies Required<ResourceLimits>);

export const DEFAULT_RESOURCE_LIMITS: Required<ResourceLimits> = DEFAULT_LIMITS;
export const AGENT_RESOURCE_LIMITS: Required<ResourceLimits> = AGENT_LIMITS;

export function resolveProfile(
  options?: { profile?: MpqProfile; isStrict?: boolean; limits?: ResourceLimits }
): { profile: MpqProfile; strict: boolean; limits: Required<ResourceLimits> } {
  const profile = options?.profile ?? 'strict';
  const defaults = profile === 'agent' ? AGENT_RESOURCE_LIMITS : DEFAULT_RESOURCE_LIMITS;
  const strict = options?.isStrict ?? profile !== 'compat';
  return { profile, strict, limits: { ...defaults, ...definedOnly(options?.limits) } };
}

function definedOnly(limits: ResourceLimits | undefined): ResourceLimits {
  const result: ResourceLimits = {};
  if (!limits) return result;
  if (limits.maxHashTableEntries !== undefined) result.maxHashTableEntries = limits.maxHashTableEntries;
  if (limits.maxBlockTableEntries !== undefined) result.maxBlockTableEntries = limits.maxBlockTableEntries;
  if (limits.maxFileBytes !== undefined) result.maxFileBytes = limits.maxFileBytes;
  if (limits.maxCompressionRatio !== undefined) result.maxCompressionRatio = limits.maxCompressionRatio;
  if (limits.maxSectorSizeShift !== undefined) result.maxSectorSizeShift = limits.maxSectorSizeShift;
  if (limits.maxHeaderSearchBytes !== undefined) result.maxHeaderSearchBytes = limits.maxHeaderSearchBytes;
  return result;
}
