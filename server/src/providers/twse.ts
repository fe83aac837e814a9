// TWSE BFI82U (institutional investors' daily buy/sell totals) CSV download
import { decodeCsvBytes } from '../utils/decode.js';
import { fetchWithRetry } from '../utils/fetchRetry.js';

export const BFI82U_URL = 'https://www.twse.com.tw/exchangeReport/BFI82U';

export interface Bfi82uSource {
  /** Raw CSV text for `YYYYMMDD`; throws with a readable reason when unavailable. */
  fetchDay(date: string): Promise<string>;
}

export class TwseBfi82uSource implements Bfi82uSource {
  async fetchDay(date: string): Promise<string> {
    const url = `${BFI82U_URL}?response=csv&date=${date}`;
    const res = await fetchWithRetry(url, {
      headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; market-desk)',
        Referer: 'https://www.twse.com.tw/zh/trading/foreign/bfi82u.html',
      },
    }, { retries: 2, timeoutMs: 15_000, label: 'twse' });
    if (!res.ok) throw new Error(`TWSE responded ${res.status}`);
    const text = decodeCsvBytes(Buffer.from(await res.arrayBuffer()));
    if (!text.trim() || text.slice(0, 200).toLowerCase().includes('html')) {
      throw new Error('TWSE returned no CSV (holiday or blocked)');
    }
    return text;
  }
}
