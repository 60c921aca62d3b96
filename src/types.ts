export type Verdict = 'governed-encrypted' | 'governed-plaintext' | 'ungoverned' | 'skipped';

export type PolicyMode = 'attributes' | 'scope';
export type ContentSource = 'worktree' | 'index';
export type SnifferName = 'builtin' | 'file';

export type PolicyRule = {
  pattern: string;
  directive: string;
  // 1-based line in the rules file
  line: number;
};

export type Policy = {
  source: string;
  rules: PolicyRule[];
};

export type MarkerKind = 'line-prefix' | 'substring' | 'magic';

export type Marker = {
  id: string;
  label: string;
  kind: MarkerKind;
  // text for line-prefix/substring; hex bytes for magic, `??` matches any byte
  value: string;
};

export type ClassifyMethod = 'type' | 'marker' | 'ratio' | 'none';

export type ClassificationEvidence = {
  reportedType: string;
  markerHits: string[];
  printableRatio: number | null;
  method: ClassifyMethod;
};

export type Classification = {
  encrypted: boolean;
  evidence: ClassificationEvidence;
};

export type Sniffer = (bytes: Uint8Array) => string;

export type FileResult = {
  path: string;
  verdict: Verdict;
  rule?: PolicyRule;
  evidence?: ClassificationEvidence;
  reason?: string;
};

export type CheckReport = {
  status: 'pass' | 'fail';
  mode: PolicyMode;
  scope?: string;
  policyFound: boolean;
  rulesFile: string;
  checked: number;
  encrypted: number;
  violations: string[];
  skipped: { path: string; reason: string }[];
  results: FileResult[];
};
