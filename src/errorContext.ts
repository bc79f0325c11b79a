const RESERVED_REPORT_KEYS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'hint', 'context'];

/**
 * Copy an error context, dropping keys that would shadow top-level report
 * fields once the error is serialized.
 */
export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  shadowedKeys: readonly string[] = []
): Record<string, string> {
  const result: Record<string, string> = {};
  if (!context) return result;
  const reserved = new Set<string>([...RESERVED_REPORT_KEYS, ...shadowedKeys]);
  for (const [key, value] of Object.entries(context)) {
    if (!reserved.has(key)) result[key] = value;
  }
  return result;
}
