/** `?refresh=true` style flags; repeated params use the first value. */
export function queryFlag(v: unknown): boolean {
  const raw = Array.isArray(v) ? v[0] : v;
  return typeof raw === 'string' && ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());
}

export function queryString(v: unknown): string | undefined {
  const raw = Array.isArray(v) ? v[0] : v;
  return typeof raw === 'string' ? raw : undefined;
}
