import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { DEFAULT_MARKERS, parseMagic } from "./guard/markers.js";
import { resolveSniffer } from "./guard/sniff.js";
import { DEFAULT_RULES_FILE, type CheckOptions } from "./guard/engine.js";
import { isNotFound } from "./guard/policy.js";
import type { Marker } from "./types.js";

export const CONFIG_FILENAMES = [".sealcheck.yml", ".sealcheck.yaml"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const MarkerSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  kind: z.enum(["line-prefix", "substring", "magic"]),
  value: z.string().min(1),
}).superRefine((m, ctx) => {
  if (m.kind !== "magic") return;
  try {
    parseMagic(m.value);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["value"], message: e instanceof Error ? e.message : String(e) });
  }
});

const ConfigObject = z.object({
  rules: z.string().min(1).optional(),
  policy: z.enum(["attributes", "scope"]).optional(),
  scope: z.string().min(1).optional(),
  extensions: z.array(z.string().min(1)).optional(),
  source: z.enum(["worktree", "index"]).optional(),
  sniffer: z.enum(["builtin", "file"]).optional(),
  probeLimit: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
  markers: z.array(MarkerSchema).optional(),
  directiveMarkers: z.array(z.string().min(1)).min(1).optional(),
}).strict();

const SCOPE_REQUIRED = 'policy "scope" needs a scope directory';

// A config file must be complete on its own; command line options may fill in the rest.
export const ConfigSchema = ConfigObject.superRefine((c, ctx) => {
  if (c.policy === "scope" && !c.scope) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["scope"], message: SCOPE_REQUIRED });
});

export type SealcheckConfig = z.infer<typeof ConfigObject>;

function formatIssues(where: string, error: z.ZodError): string {
  const details = error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
  return `invalid configuration in ${where}: ${details}`;
}

export function parseConfig(
  data: unknown,
  where: string,
  schema: typeof ConfigSchema | typeof ConfigObject = ConfigSchema,
): SealcheckConfig {
  const res = schema.safeParse(data ?? {});
  if (!res.success) throw new ConfigError(formatIssues(where, res.error));
  return res.data;
}

/**
 * Finds and parses the YAML config. An explicit path (argument or
 * SEALCHECK_CONFIG) must exist; the default file names are optional.
 */
export async function loadConfig(cwd: string, explicit?: string): Promise<{ file?: string; config: SealcheckConfig }> {
  const given = explicit ?? process.env.SEALCHECK_CONFIG;
  const candidates = given ? [path.resolve(cwd, given)] : CONFIG_FILENAMES.map((n) => path.join(cwd, n));

  for (const file of candidates) {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (isNotFound(e) && !given) continue;
      throw new ConfigError(`cannot read config ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    let data: unknown;
    try {
      data = YAML.parse(raw);
    } catch (e) {
      throw new ConfigError(`cannot parse config ${file}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return { file, config: parseConfig(data, file) };
  }
  return { config: {} };
}

/** Same keys as the file, without the cross-field checks that only hold after merging. */
export function parseFlags(data: unknown): SealcheckConfig {
  return parseConfig(data, "command line options", ConfigObject);
}

function toMarker(m: NonNullable<SealcheckConfig["markers"]>[number]): Marker {
  return { id: m.id, label: m.label ?? m.id, kind: m.kind, value: m.value };
}

/** Flags win over the file, the file over defaults. */
export function resolveOptions(cwd: string, fileConfig: SealcheckConfig, flags: SealcheckConfig = {}): CheckOptions {
  const pick = <K extends keyof SealcheckConfig>(key: K): SealcheckConfig[K] => flags[key] ?? fileConfig[key];
  const policy = pick("policy") ?? "attributes";
  const scope = pick("scope");
  if (policy === "scope" && !scope) throw new ConfigError(`${SCOPE_REQUIRED} (set scope in the config or pass --scope)`);
  return {
    cwd,
    rulesFile: pick("rules") ?? DEFAULT_RULES_FILE,
    policy,
    scope,
    extensions: pick("extensions") ?? [],
    source: pick("source") ?? "worktree",
    sniffer: resolveSniffer(pick("sniffer") ?? "builtin"),
    probeLimit: pick("probeLimit"),
    concurrency: pick("concurrency"),
    markers: [...DEFAULT_MARKERS, ...(pick("markers") ?? []).map(toMarker)],
    directiveMarkers: pick("directiveMarkers"),
  };
}
