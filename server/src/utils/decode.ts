import iconv from 'iconv-lite';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Decodes exchange CSV bytes: UTF-8 when valid, otherwise Big5. Strips a BOM. */
export function decodeCsvBytes(buf: Buffer): string {
  let text: string;
  try {
    text = utf8.decode(buf);
  } catch {
    text = iconv.decode(buf, 'big5');
  }
  return text.replace(/^﻿/, '');
}
