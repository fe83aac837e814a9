import path from 'path';
import { fileURLToPath } from 'url';

/** Server package root (the directory holding `config/` and `data/`). */
export const SERVER_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

export function fromServerRoot(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(SERVER_ROOT, p);
}
