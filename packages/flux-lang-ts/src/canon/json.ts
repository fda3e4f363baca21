export function canonicalJsonBytes(value: unknown): Uint8Array {
  const json = canonical(value);
  return new TextEncoder().encode(json);
}

function canonical(v: unknown): string {
  if (v === null) return 'null';
  if (typeof v === 'number') {
    if (!Number.isInteger(v)) throw new Error('E_FLUX_FLOAT');
    return String(v === 0 ? 0 : v);
  }
  if (typeof v === 'string') return JSON.stringify(v);
  if (typeof v === 'boolean') return v ? 'true' : 'false';
  if (Array.isArray(v)) {
    return '[' + v.map(canonical).join(',') + ']';
  }
  if (typeof v === 'object') {
    const record = v as Record<string, unknown>;
    const keys = Object.keys(record).filter(k => record[k] !== undefined).sort();
    const entries = keys.map(k => JSON.stringify(k) + ':' + canonical(record[k]));
    return '{' + entries.join(',') + '}';
  }
  throw new Error('E_FLUX_TYPE');
}
