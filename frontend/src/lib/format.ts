// Shared lightweight formatting helpers
export function escapeHtml(s: unknown): string {
  if (s === undefined || s === null) return '';
  return String(s)
    .replace(/&/g,'&amp;')
    .replace(/</g,'&lt;')
    .replace(/>/g,'&gt;')
    .replace(/"/g,'&quot;')
    .replace(/'/g,'&#39;');
}
export function fmtNum(x: unknown, d=2): string {
  const n = Number(x);
  return Number.isFinite(n) ? n.toFixed(d) : '—';
}
export function fmtSigned(x: unknown, d=2): string {
  const n = Number(x);
  if (!Number.isFinite(n)) return '—';
  return (n > 0 ? '+' : '') + n.toFixed(d);
}
/** Grouped thousands; null, undefined and zero read as N/A like missing quotes. */
export function fmtPrice(x: number | null | undefined, maxDigits=2): string {
  if (typeof x !== 'number' || !Number.isFinite(x) || x === 0) return 'N/A';
  return x.toLocaleString('en-US', { maximumFractionDigits: maxDigits });
}
/** `2026-04-20` → `4/20` */
export function shortDate(iso: string): string {
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(iso);
  return m ? `${Number(m[2])}/${Number(m[3])}` : iso;
}
const WEEKDAYS = ['Sun','Mon','Tue','Wed','Thu','Fri','Sat'];
/** `2026-03-16` → `Mon 3/16` */
export function dayLabel(iso: string): string {
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(iso);
  if (!m) return iso;
  const wd = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]))).getUTCDay();
  return `${WEEKDAYS[wd]} ${Number(m[2])}/${Number(m[3])}`;
}
/** ISO instant → `YYYY-MM-DD HH:MM` in UTC */
export function isoMinute(iso: string): string {
  return iso.slice(0, 16).replace('T', ' ');
}
