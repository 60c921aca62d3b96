import type { Marker } from '../types.js';

// Checked in this order; the first hit is the one reported first.
export const DEFAULT_MARKERS: readonly Marker[] = [
  { id: 'ansible-vault', label: 'Ansible Vault', kind: 'line-prefix', value: '$ANSIBLE_VAULT' },
  { id: 'ansible-vault-alt', label: 'Ansible Vault (alternative format)', kind: 'line-prefix', value: 'ansible-vault' },
  { id: 'sops', label: 'SOPS', kind: 'substring', value: 'sops:' },
  { id: 'age', label: 'age', kind: 'substring', value: 'age:' },
  { id: 'pgp', label: 'PGP', kind: 'substring', value: 'pgp:' },
  { id: 'pgp-message', label: 'PGP message', kind: 'substring', value: 'BEGIN PGP MESSAGE' },
  { id: 'encrypted-message', label: 'encrypted message', kind: 'substring', value: 'BEGIN ENCRYPTED MESSAGE' },
  { id: 'pgp-block', label: 'PGP message block', kind: 'substring', value: '-----BEGIN PGP MESSAGE-----' },
  { id: 'enc-value', label: 'ENC[] value', kind: 'substring', value: 'ENC[' },
  { id: 'git-crypt', label: 'git-crypt', kind: 'magic', value: '?? 47 49 54 43 52 59 50 54' },
];

// Directive text that makes a rules-file line encryption-relevant.
export const DEFAULT_DIRECTIVE_MARKERS: readonly string[] = [
  'filter=',
  'git-crypt',
  'sops',
  'ansible-vault',
  'encrypt',
];

// Sniffed type descriptors containing any of these count as encrypted.
export const ENCRYPTED_TYPE_KEYWORDS: readonly string[] = [
  'data',
  'encrypted',
  'binary',
  'gzip',
  'compressed',
];

export function parseMagic(value: string): (number | null)[] {
  return value.trim().split(/\s+/).filter(Boolean).map((tok) => {
    if (tok === '??') return null;
    if (!/^[0-9a-fA-F]{2}$/.test(tok)) throw new Error(`invalid magic byte '${tok}'`);
    return parseInt(tok, 16);
  });
}

export function magicMatches(bytes: Uint8Array, magic: (number | null)[]): boolean {
  if (magic.length === 0 || bytes.length < magic.length) return false;
  return magic.every((b, i) => b === null || bytes[i] === b);
}

export function markerMatches(marker: Marker, text: string, bytes: Uint8Array): boolean {
  switch (marker.kind) {
    case 'magic':
      return magicMatches(bytes, parseMagic(marker.value));
    case 'line-prefix':
      return text.startsWith(marker.value) || text.includes(`\n${marker.value}`);
    case 'substring':
      return text.includes(marker.value);
  }
}
