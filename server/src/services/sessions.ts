import type { MetalsSession } from '../types/market.types.js';
import { hhmm, zonedParts } from '../utils/time.js';

export const NEW_YORK = 'America/New_York';

// COMEX regular (day) session, minutes after midnight ET
const DAY_OPEN = 8 * 60 + 20;
const DAY_CLOSE = 13 * 60 + 30;

export interface ComexSessionInfo {
  session: MetalsSession;
  /** Current New York wall-clock time, `HH:MM` */
  et: string;
}

/** Weekdays 08:20-13:30 ET are the day session; everything else trades electronically overnight. */
export function comexSession(now: Date): ComexSessionInfo {
  const p = zonedParts(now, NEW_YORK);
  const minutes = p.hour * 60 + p.minute;
  const weekday = p.weekday >= 1 && p.weekday <= 5;
  const session: MetalsSession = weekday && minutes >= DAY_OPEN && minutes < DAY_CLOSE ? 'day' : 'night';
  return { session, et: hhmm(p.hour, p.minute) };
}
