import path from "node:path";
import fs from "node:fs/promises";
import * as fss from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, InvalidArgumentError } from "commander";
import fg from "fast-glob";
import { ConfigError, loadConfig, parseFlags, resolveOptions, type SealcheckConfig } from "./config.js";
import { classify, loadPolicy, matchRule, runCheck, type ClassificationEvidence } from "./guard/index.js";
import { gitRoot, gitStagedFiles } from "./guard/utils/git.js";
import { describeEvidence, formatReport, reportWarnings } from "./report.js";

// Resolve package version without JSON import attributes
let pkgVersion = "0.0.0";
try {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const raw = fss.readFileSync(pkgPath, "utf8");
  pkgVersion = JSON.parse(raw)?.version ?? pkgVersion;
} catch {
  // keep the fallback version
}

type CommonFlags = {
  cwd?: string;
  config?: string;
  json?: boolean;
  sniffer?: string;
  probeLimit?: number;
};

type CheckFlags = CommonFlags & {
  staged?: boolean;
  rules?: string;
  policy?: string;
  scope?: string;
  ext?: string;
  source?: string;
  verbose?: boolean;
  concurrency?: number;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("expected a positive integer");
  return n;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value == null) return undefined;
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

function resolveCwd(flag?: string): string {
  if (flag) return path.resolve(flag);
  return gitRoot(process.cwd()) ?? process.cwd();
}

async function optionsFor(cwd: string, flags: CheckFlags) {
  const { config } = await loadConfig(cwd, flags.config);
  const fromFlags: SealcheckConfig = parseFlags({
    rules: flags.rules,
    policy: flags.policy,
    scope: flags.scope,
    extensions: splitList(flags.ext),
    source: flags.source,
    sniffer: flags.sniffer,
    probeLimit: flags.probeLimit,
    concurrency: flags.concurrency,
  });
  return resolveOptions(cwd, config, fromFlags);
}

async function expandArgs(patterns: string[], cwd: string): Promise<string[]> {
  const out: string[] = [];
  for (const p of patterns) {
    if (fg.isDynamicPattern(p)) out.push(...(await fg(p, { cwd, dot: true, onlyFiles: true })).sort());
    else out.push(p);
  }
  return out;
}

function handleError(e: unknown) {
  if (e instanceof ConfigError) {
    console.error(`sealcheck: ${e.message}`);
    process.exitCode = 2;
    return;
  }
  console.error("sealcheck: fatal", e);
  process.exitCode = 1;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("sealcheck")
    .description("Block commits of files that the repository marks as encrypted but that are stored in plaintext")
    .version(String(pkgVersion));

  program
    .command("check", { isDefault: true })
    .description("Check candidate files against the encryption rules (exit 1 when any governed file is plaintext)")
    .argument("[files...]", "files to check (default: files staged for commit)")
    .option("--staged", "check the files staged for commit")
    .option("-r, --rules <file>", "rules file, relative to the repository root (default: .gitattributes)")
    .option("--policy <mode>", "attributes: governed by the rules file | scope: every file under --scope is governed")
    .option("--scope <dir>", "only consider files under this directory")
    .option("--ext <list>", "only consider these extensions, comma separated (e.g. yaml,yml)")
    .option("--source <source>", "content to inspect: worktree|index")
    .option("--sniffer <name>", "content-type sniffer: builtin|file")
    .option("--probe-limit <n>", "bytes sampled by the printable-ratio check", positiveInt)
    .option("--concurrency <n>", "files read at the same time (default: 8)", positiveInt)
    .option("--json", "print the report as JSON")
    .option("-v, --verbose", "also list ungoverned and skipped files and the matching rule")
    .option("-C, --cwd <dir>", "repository root (default: git top-level or current directory)")
    .option("-c, --config <file>", "config file (default: .sealcheck.yml)")
    .action(async (files: string[], flags: CheckFlags) => {
      try {
        const cwd = resolveCwd(flags.cwd);
        const opts = await optionsFor(cwd, flags);
        // relative arguments are taken from where the command runs unless --cwd names the root
        const base = flags.cwd ? cwd : process.cwd();
        const candidates =
          flags.staged || files.length === 0 ? gitStagedFiles(cwd) : files.map((f) => path.relative(cwd, path.resolve(base, f)));
        const report = await runCheck(candidates, opts);

        if (flags.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          for (const w of reportWarnings(report)) console.warn(`sealcheck: ${w}`);
          const lines = formatReport(report, { verbose: !!flags.verbose });
          if (report.status === "fail") lines.forEach((l) => console.error(l));
          else lines.forEach((l) => console.log(l));
        }
        if (report.status === "fail") process.exitCode = 1;
      } catch (e) {
        handleError(e);
      }
    });

  program
    .command("classify")
    .description("Show the encryption evidence for files, regardless of any rules")
    .argument("<files...>", "files or glob patterns")
    .option("--sniffer <name>", "content-type sniffer: builtin|file")
    .option("--probe-limit <n>", "bytes sampled by the printable-ratio check", positiveInt)
    .option("--json", "print results as JSON")
    .option("-C, --cwd <dir>", "base directory (default: current directory)")
    .option("-c, --config <file>", "config file (default: .sealcheck.yml)")
    .action(async (patterns: string[], flags: CommonFlags) => {
      try {
        const cwd = flags.cwd ? path.resolve(flags.cwd) : process.cwd();
        const opts = await optionsFor(cwd, flags);
        const rows: { path: string; encrypted: boolean; evidence: ClassificationEvidence }[] = [];
        for (const file of await expandArgs(patterns, cwd)) {
          let bytes: Buffer;
          try {
            bytes = await fs.readFile(path.resolve(cwd, file));
          } catch (e) {
            console.error(`sealcheck: cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
            process.exitCode = 1;
            continue;
          }
          const { encrypted, evidence } = classify(bytes, opts);
          rows.push({ path: file, encrypted, evidence });
          if (!flags.json) console.log(`${file}: ${encrypted ? "ENCRYPTED" : "PLAINTEXT"} (${describeEvidence(evidence)})`);
        }
        if (flags.json) console.log(JSON.stringify(rows, null, 2));
      } catch (e) {
        handleError(e);
      }
    });

  program
    .command("explain")
    .description("Show which rule, if any, governs each path")
    .argument("<paths...>", "repository-relative paths")
    .option("-r, --rules <file>", "rules file (default: .gitattributes)")
    .option("-C, --cwd <dir>", "repository root (default: git top-level or current directory)")
    .option("-c, --config <file>", "config file (default: .sealcheck.yml)")
    .action(async (paths: string[], flags: CheckFlags) => {
      try {
        const cwd = resolveCwd(flags.cwd);
        const opts = await optionsFor(cwd, flags);
        const rulesFile = path.resolve(cwd, opts.rulesFile ?? ".gitattributes");
        const policy = await loadPolicy(rulesFile, opts.directiveMarkers);
        if (!policy) console.warn(`sealcheck: rules file not found: ${rulesFile} (no file is governed)`);
        const name = path.basename(rulesFile);
        for (const p of paths) {
          const rule = policy ? matchRule(p, policy) : undefined;
          console.log(rule ? `${p}: governed by ${name}:${rule.line} ${rule.pattern} ${rule.directive}` : `${p}: not governed`);
        }
      } catch (e) {
        handleError(e);
      }
    });

  return program;
}
