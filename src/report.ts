import path from "node:path";
import pc from "picocolors";
import type { CheckReport, ClassificationEvidence, FileResult } from "./types.js";

export type Colors = ReturnType<typeof pc.createColors>;

export type ReportOptions = {
  colors?: Colors;
  verbose?: boolean;
};

export function describeEvidence(e: ClassificationEvidence): string {
  switch (e.method) {
    case "type":
      return `file type: ${e.reportedType}`;
    case "marker":
      return `marker: ${e.markerHits.join(", ")}`;
    case "ratio":
      return `printable ratio ${e.printableRatio}%`;
    case "none":
      return e.printableRatio === null
        ? `file type: ${e.reportedType}`
        : `file type: ${e.reportedType}, printable ratio ${e.printableRatio}%`;
  }
}

function describeRule(r: FileResult, rulesFile: string): string {
  if (!r.rule) return "";
  return ` [${path.basename(rulesFile)}:${r.rule.line} ${r.rule.pattern} -> ${r.rule.directive}]`;
}

export function reportWarnings(report: CheckReport): string[] {
  const out: string[] = [];
  if (!report.policyFound) out.push(`rules file not found: ${report.rulesFile} (no file is governed)`);
  for (const s of report.skipped) {
    if (s.reason !== "missing") out.push(`skipping unreadable file ${s.path}: ${s.reason}`);
  }
  return out;
}

/** Human-readable summary; remediation is always included on failure. */
export function formatReport(report: CheckReport, opts: ReportOptions = {}): string[] {
  const { colors: c = pc, verbose = false } = opts;
  const rulesName = path.basename(report.rulesFile);
  const where = report.mode === "scope" ? `under ${report.scope ?? "."}` : `in ${rulesName}`;
  const lines: string[] = [];

  for (const r of report.results) {
    const why = r.evidence ? ` (${describeEvidence(r.evidence)})` : "";
    const rule = verbose ? describeRule(r, report.rulesFile) : "";
    if (r.verdict === "governed-encrypted") lines.push(`${c.green("✔ encrypted    ")} ${r.path}${why}${rule}`);
    else if (r.verdict === "governed-plaintext") lines.push(`${c.red("✖ not encrypted")} ${r.path}${why}${rule}`);
    else if (verbose && r.verdict === "ungoverned") lines.push(`${c.dim("- not governed ")} ${r.path}`);
    else if (verbose && r.verdict === "skipped") lines.push(`${c.yellow("- skipped      ")} ${r.path} (${r.reason ?? "unreadable"})`);
  }

  if (lines.length) lines.push("");
  lines.push(c.bold("=== Encryption check results ==="));
  lines.push(`Files checked: ${report.checked}`);
  lines.push(`Encrypted: ${c.green(String(report.encrypted))}`);
  lines.push(`Unencrypted: ${c.red(String(report.violations.length))}`);

  if (report.status === "fail") {
    lines.push("");
    lines.push(c.red("COMMIT BLOCKED: found unencrypted files that must be encrypted"));
    lines.push(c.yellow(`The following files ${where} must be encrypted:`));
    for (const v of report.violations) lines.push(`  - ${c.red(v)}`);
    lines.push("");
    lines.push(c.yellow("How to fix:"));
    lines.push("1. Encrypt the files, for example:");
    lines.push("   - Ansible Vault: ansible-vault encrypt <file>");
    lines.push("   - SOPS: sops -e -i <file>");
    lines.push("   - git-crypt: git-crypt unlock, then git add <file> again");
    lines.push("   - GPG: gpg -c <file>");
    lines.push("2. Stage the encrypted files and commit again");
    if (report.mode === "attributes") lines.push(`3. Or update ${rulesName} if the file should not be encrypted`);
    lines.push(`${report.mode === "attributes" ? 4 : 3}. Or use --no-verify to skip this check (not recommended)`);
  } else if (report.checked === 0) {
    lines.push(c.yellow(`No files marked for encryption ${where} to check`));
  } else {
    lines.push(c.green("All files marked for encryption are encrypted"));
  }
  return lines;
}
