import { describe, it, expect } from "vitest";
import path from "node:path";
import { isGoverned, loadPolicy, matchRule, parseRules } from "../guard/policy.js";
import { makeTempDir } from "./helpers.js";

const ATTRIBUTES = [
  "# encryption policy",
  "secret/** filter=git-crypt diff=git-crypt",
  "",
  "*.md text",
  "  indented filter=sops",
  "badline",
  "config/*.enc.yaml filter=sops",
].join("\n");

describe("parseRules", () => {
  it("keeps encryption-relevant rules in file order with line numbers", () => {
    expect(parseRules(ATTRIBUTES)).toEqual([
      { pattern: "secret/**", directive: "filter=git-crypt diff=git-crypt", line: 2 },
      { pattern: "config/*.enc.yaml", directive: "filter=sops", line: 7 },
    ]);
  });

  it("recognizes every directive marker", () => {
    const text = [
      "a filter=custom",
      "b git-crypt",
      "c sops",
      "d ansible-vault",
      "e encrypted=true",
      "f text eol=lf",
    ].join("\n");
    expect(parseRules(text).map((r) => r.pattern)).toEqual(["a", "b", "c", "d", "e"]);
  });

  it("strips carriage returns", () => {
    expect(parseRules("a.key filter=git-crypt\r\n")).toEqual([{ pattern: "a.key", directive: "filter=git-crypt", line: 1 }]);
  });

  it("skips a rule whose pattern does not compile and keeps the rest", () => {
    const rules = parseRules("[z-a].yaml filter=git-crypt\nsecret/** filter=git-crypt\n");
    expect(rules).toEqual([{ pattern: "secret/**", directive: "filter=git-crypt", line: 2 }]);
    expect(matchRule("secret/a.yaml", { source: ".gitattributes", rules })?.line).toBe(2);
  });

  it("accepts a custom directive marker list", () => {
    expect(parseRules("a.key seal\nb.key filter=x\n", ["seal"]).map((r) => r.pattern)).toEqual(["a.key"]);
  });
});

describe("matchRule", () => {
  it("first matching rule wins even when a later one is more specific", () => {
    const policy = { source: ".gitattributes", rules: parseRules("secret/** filter=git-crypt\nsecret/public.yaml filter=sops\n") };
    expect(matchRule("secret/public.yaml", policy)?.line).toBe(1);
  });

  it("a subtree rule governs files that an irrelevant later rule names", () => {
    const policy = { source: ".gitattributes", rules: parseRules("secret/** filter=git-crypt\nsecret/public.yaml -nogovern-\n") };
    expect(matchRule("secret/public.yaml", policy)).toEqual({ pattern: "secret/**", directive: "filter=git-crypt", line: 1 });
  });

  it("returns undefined when nothing matches", () => {
    const policy = { source: ".gitattributes", rules: parseRules(ATTRIBUTES) };
    expect(matchRule("docs/readme.md", policy)).toBeUndefined();
  });
});

describe("loadPolicy / isGoverned", () => {
  it("returns null for a missing rules file", async () => {
    const dir = await makeTempDir();
    expect(await loadPolicy(path.join(dir, ".gitattributes"))).toBeNull();
    expect(await isGoverned("secret/a.yaml", path.join(dir, ".gitattributes"))).toEqual({ governed: false });
  });

  it("reports the governing rule", async () => {
    const dir = await makeTempDir({ ".gitattributes": ATTRIBUTES });
    const rulesFile = path.join(dir, ".gitattributes");
    expect(await isGoverned("config/db.enc.yaml", rulesFile)).toEqual({
      governed: true,
      rule: { pattern: "config/*.enc.yaml", directive: "filter=sops", line: 7 },
    });
    expect(await isGoverned("config/db.yaml", rulesFile)).toEqual({ governed: false });
  });
});
