/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order
 *
 * Keeps the CLI's output stable for tests and diffs.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(sortKeysDeep(value), null, space) + '\n';
}

function isPlainRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function sortKeysDeep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (!isPlainRecord(v)) return v;

  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) {
    out[k] = sortKeysDeep(v[k]);
  }
  return out;
}
