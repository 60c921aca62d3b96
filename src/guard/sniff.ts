import { spawnSync } from 'node:child_process';
import type { Sniffer, SnifferName } from '../types.js';
import { magicMatches, parseMagic } from './markers.js';

const SNIFF_BYTES = 64 * 1024;

// Descriptors follow file(1) wording so both sniffers feed the same keyword check.
const SIGNATURES: { magic: string; type: string }[] = [
  { magic: '1f 8b', type: 'gzip compressed data' },
  { magic: '42 5a 68', type: 'bzip2 compressed data' },
  { magic: 'fd 37 7a 58 5a 00', type: 'XZ compressed data' },
  { magic: '28 b5 2f fd', type: 'Zstandard compressed data' },
  { magic: '50 4b 03 04', type: 'Zip archive data' },
  { magic: '37 7a bc af 27 1c', type: '7-zip archive data' },
  { magic: '00 47 49 54 43 52 59 50 54 00', type: 'git-crypt encrypted data' },
  { magic: '53 61 6c 74 65 64 5f 5f', type: "openssl enc'd data with salted password" },
];

const AGE_HEADER = 'age-encryption.org/';

function isTextByte(b: number): boolean {
  // printable ASCII, BEL..CR and ESC as file(1) does
  return (b >= 0x20 && b <= 0x7e) || (b >= 0x07 && b <= 0x0d) || b === 0x1b;
}

/** Content-type sniffing from magic bytes and a text/binary test, no native tooling. */
export const builtinSniffer: Sniffer = (bytes) => {
  if (bytes.length === 0) return 'empty';
  for (const sig of SIGNATURES) {
    if (magicMatches(bytes, parseMagic(sig.magic))) return sig.type;
  }
  const head = bytes.subarray(0, SNIFF_BYTES);
  const ascii = head.every(isTextByte);
  if (ascii) {
    const text = Buffer.from(head).toString('latin1');
    if (text.startsWith(AGE_HEADER)) return 'age encrypted file';
    return 'ASCII text';
  }
  try {
    // stream mode: a multi-byte sequence cut at the sample boundary is not an error
    const text = new TextDecoder('utf-8', { fatal: true }).decode(head, { stream: head.length < bytes.length });
    for (let i = 0; i < text.length; i++) {
      const code = text.charCodeAt(i);
      if (code < 0x80 && !isTextByte(code)) return 'data';
    }
    return 'UTF-8 Unicode text';
  } catch {
    return extendedAsciiType(head);
  }
};

// Single-byte encodings such as Latin-1: high bytes allowed, NUL and other controls are not.
function extendedAsciiType(head: Uint8Array): string {
  if (!head.every((b) => b >= 0x80 || isTextByte(b))) return 'data';
  return head.some((b) => b >= 0x80 && b <= 0x9f) ? 'Non-ISO extended-ASCII text' : 'ISO-8859 text';
}

/** Delegates to file(1); throws when the command is missing or fails. */
export const fileCommandSniffer: Sniffer = (bytes) => {
  const res = spawnSync('file', ['-b', '-'], { input: bytes, encoding: 'utf8', stdio: 'pipe' });
  if (res.error) throw res.error;
  if (res.status !== 0) throw new Error(res.stderr.trim() || `file exited with code ${res.status}`);
  return res.stdout.trim();
};

export function resolveSniffer(name: SnifferName): Sniffer {
  return name === 'file' ? fileCommandSniffer : builtinSniffer;
}
