import type { Classification, ClassificationEvidence, Marker, Sniffer } from '../types.js';
import { DEFAULT_MARKERS, ENCRYPTED_TYPE_KEYWORDS, markerMatches } from './markers.js';
import { builtinSniffer } from './sniff.js';

export const DEFAULT_PROBE_LIMIT = 1000;
export const PRINTABLE_THRESHOLD = 80;

export type ClassifyOptions = {
  probeLimit?: number;
  markers?: readonly Marker[];
  sniffer?: Sniffer;
};

function isPrintableOrSpace(b: number): boolean {
  return (b >= 0x20 && b <= 0x7e) || (b >= 0x09 && b <= 0x0d);
}

/** Integer percentage of printable or whitespace bytes in the first `limit` bytes; null for an empty sample. */
export function printableRatio(bytes: Uint8Array, limit = DEFAULT_PROBE_LIMIT): number | null {
  const sample = bytes.subarray(0, Math.max(0, limit));
  if (sample.length === 0) return null;
  let printable = 0;
  for (const b of sample) if (isPrintableOrSpace(b)) printable++;
  return Math.floor((printable * 100) / sample.length);
}

function sniffType(bytes: Uint8Array, sniffer: Sniffer): string {
  try {
    return sniffer(bytes) || 'unknown';
  } catch {
    // a failing sniffer only removes the first signal
    return 'unknown';
  }
}

export function findMarkers(bytes: Uint8Array, markers: readonly Marker[] = DEFAULT_MARKERS): string[] {
  const text = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('utf8');
  return markers.filter((m) => markerMatches(m, text, bytes)).map((m) => m.id);
}

/**
 * Decides whether `bytes` look encrypted. Methods run in order and the first
 * positive one wins:
 *
 * 1. sniffed type mentions data/encrypted/binary/gzip/compressed
 * 2. a known encryption marker is present
 * 3. fewer than 80% of the first `probeLimit` bytes are printable
 *
 * Anything else is plaintext, including an empty file. Compressed but
 * unencrypted content is reported as encrypted.
 */
export function classify(bytes: Uint8Array, opts: ClassifyOptions = {}): Classification {
  const { probeLimit = DEFAULT_PROBE_LIMIT, markers = DEFAULT_MARKERS, sniffer = builtinSniffer } = opts;

  const reportedType = sniffType(bytes, sniffer);
  const evidence: ClassificationEvidence = { reportedType, markerHits: [], printableRatio: null, method: 'none' };

  const lowered = reportedType.toLowerCase();
  if (ENCRYPTED_TYPE_KEYWORDS.some((k) => lowered.includes(k))) {
    return { encrypted: true, evidence: { ...evidence, method: 'type' } };
  }

  const hits = findMarkers(bytes, markers);
  if (hits.length) {
    return { encrypted: true, evidence: { ...evidence, markerHits: hits, method: 'marker' } };
  }

  const ratio = printableRatio(bytes, probeLimit);
  if (ratio !== null && ratio < PRINTABLE_THRESHOLD) {
    return { encrypted: true, evidence: { ...evidence, printableRatio: ratio, method: 'ratio' } };
  }
  return { encrypted: false, evidence: { ...evidence, printableRatio: ratio } };
}
