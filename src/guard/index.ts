export { runCheck, selectCandidates, toRepoPath, DEFAULT_CONCURRENCY, DEFAULT_RULES_FILE, type CheckOptions } from './engine.js';
export { classify, findMarkers, printableRatio, DEFAULT_PROBE_LIMIT, type ClassifyOptions } from './classify.js';
export { parseRules, loadPolicy, matchRule, isGoverned } from './policy.js';
export { builtinSniffer, fileCommandSniffer, resolveSniffer } from './sniff.js';
export { DEFAULT_MARKERS, DEFAULT_DIRECTIVE_MARKERS, ENCRYPTED_TYPE_KEYWORDS } from './markers.js';
export { patternMatches } from './utils/glob.js';
export type {
  CheckReport, Classification, ClassificationEvidence, FileResult, Marker, Policy, PolicyRule, Sniffer, Verdict,
} from '../types.js';
