/**
 * Text Source
 *
 * Reads raw table text from local disk or over HTTP(S) and decodes it,
 * trying UTF-8, UTF-16, UTF-32 and ASCII in that order.
 */

import { readFile } from 'fs/promises';
import axios from 'axios';
import { SourceAccessError } from '../errors/index.js';

const HTTP_TIMEOUT_MS = 30_000;

export type TextEncodingName = 'utf-8' | 'utf-16' | 'utf-32' | 'ascii';

export interface DecodedText {
  text: string;
  encoding: TextEncodingName;
}

// ─── Decoders ─────────────────────────────────────────────────────────────────
// Each returns undefined when the bytes are not valid in that encoding.

function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function decodeUtf16(bytes: Uint8Array): string | undefined {
  if (bytes.length % 2 !== 0) return undefined;
  const bigEndian = bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff;
  try {
    return new TextDecoder(bigEndian ? 'utf-16be' : 'utf-16le', { fatal: true }).decode(bytes);
  } catch {
    return undefined;
  }
}

function decodeUtf32(bytes: Uint8Array): string | undefined {
  if (bytes.length % 4 !== 0) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let littleEndian = true;
  let offset = 0;
  if (bytes.length >= 4) {
    const bom = view.getUint32(0, false);
    if (bom === 0x0000feff) {
      littleEndian = false;
      offset = 4;
    } else if (bom === 0xfffe0000) {
      offset = 4;
    }
  }

  const parts: string[] = [];
  for (; offset < bytes.length; offset += 4) {
    const code = view.getUint32(offset, littleEndian);
    if (code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return undefined;
    parts.push(String.fromCodePoint(code));
  }
  return parts.join('');
}

function decodeAscii(bytes: Uint8Array): string | undefined {
  let out = '';
  for (const byte of bytes) {
    if (byte > 0x7f) return undefined;
    out += String.fromCharCode(byte);
  }
  return out;
}

const DECODERS: Array<[TextEncodingName, (bytes: Uint8Array) => string | undefined]> = [
  ['utf-8', decodeUtf8],
  ['utf-16', decodeUtf16],
  ['utf-32', decodeUtf32],
  ['ascii', decodeAscii],
];

/**
 * Decode bytes with the first encoding that accepts them.
 * Throws SourceAccessError (reason `undecodable`) when none does.
 */
export function decodeText(bytes: Uint8Array, source: string): DecodedText {
  for (const [encoding, decode] of DECODERS) {
    const text = decode(bytes);
    if (text !== undefined) {
      return { text, encoding };
    }
  }
  throw new SourceAccessError(`No supported encoding could decode ${source}`, source, 'undecodable', bytes);
}

// ─── Loaders ──────────────────────────────────────────────────────────────────

export async function loadTextFromFile(filePath: string): Promise<DecodedText> {
  let data: Buffer;
  try {
    data = await readFile(filePath);
  } catch (err) {
    throw new SourceAccessError(
      `Cannot access ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      'unreadable',
      undefined,
      { cause: err }
    );
  }
  return decodeText(data, filePath);
}

export async function loadTextFromUrl(url: string): Promise<DecodedText> {
  let data: Uint8Array;
  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: HTTP_TIMEOUT_MS,
      headers: { 'User-Agent': 'Tablesmith/0.1.0' },
    });
    data = new Uint8Array(response.data);
  } catch (err) {
    throw new SourceAccessError(
      `Cannot download ${url}: ${err instanceof Error ? err.message : String(err)}`,
      url,
      'unreadable',
      undefined,
      { cause: err }
    );
  }
  return decodeText(data, url);
}

/** True for http: and https: URLs; anything else is treated as a file path. */
export function isRemoteSource(source: string): boolean {
  return /^https?:\/\//i.test(source);
}
