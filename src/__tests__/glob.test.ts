import { describe, it, expect } from "vitest";
import { isUnder, isValidPattern, normalizePath, patternMatches } from "../guard/utils/glob.js";

describe("patternMatches", () => {
  it("trailing /** matches the whole subtree", () => {
    expect(patternMatches("secret/**", "secret/a.yaml")).toBe(true);
    expect(patternMatches("secret/**", "secret/deep/er/b.yaml")).toBe(true);
    expect(patternMatches("secret/**", "secrets/a.yaml")).toBe(false);
    expect(patternMatches("secret/**", "secret")).toBe(false);
  });

  it("* stays within one segment, ** crosses segments", () => {
    expect(patternMatches("secret/*.yaml", "secret/a.yaml")).toBe(true);
    expect(patternMatches("secret/*.yaml", "secret/nested/a.yaml")).toBe(false);
    expect(patternMatches("secret/**.yaml", "secret/nested/a.yaml")).toBe(true);
    expect(patternMatches("secret/**/*.yaml", "secret/a.yaml")).toBe(true);
  });

  it("slash-less patterns match the basename at any depth", () => {
    expect(patternMatches("*.key", "config/prod/db.key")).toBe(true);
    expect(patternMatches("*.key", "config/prod/db.key.txt")).toBe(false);
  });

  it("a leading slash anchors to the root", () => {
    expect(patternMatches("/top.yaml", "top.yaml")).toBe(true);
    expect(patternMatches("/top.yaml", "sub/top.yaml")).toBe(false);
  });

  it("supports ? and character classes", () => {
    expect(patternMatches("secret/?.yaml", "secret/a.yaml")).toBe(true);
    expect(patternMatches("secret/?.yaml", "secret/ab.yaml")).toBe(false);
    expect(patternMatches("config/[ab].env", "config/a.env")).toBe(true);
    expect(patternMatches("config/[ab].env", "config/c.env")).toBe(false);
    expect(patternMatches("config/[!ab].env", "config/c.env")).toBe(true);
  });

  it("treats regex metacharacters literally", () => {
    expect(patternMatches("a+b.yaml", "a+b.yaml")).toBe(true);
    expect(patternMatches("a+b.yaml", "aab.yaml")).toBe(false);
    expect(patternMatches("v(1).yaml", "v(1).yaml")).toBe(true);
  });

  it("normalizes candidate paths", () => {
    expect(normalizePath("./secret\\a.yaml")).toBe("secret/a.yaml");
    expect(patternMatches("secret/**", "./secret/a.yaml")).toBe(true);
  });
});

describe("isUnder", () => {
  it("matches paths beneath the directory only", () => {
    expect(isUnder("secret", "secret/a.yaml")).toBe(true);
    expect(isUnder("secret/", "secret/x/a.yaml")).toBe(true);
    expect(isUnder("secret", "secrets/a.yaml")).toBe(false);
    expect(isUnder(".", "anything.yaml")).toBe(true);
  });
});

describe("isValidPattern", () => {
  it("rejects patterns that cannot be compiled", () => {
    expect(isValidPattern("secret/**")).toBe(true);
    expect(isValidPattern("config/[ab].env")).toBe(true);
    expect(isValidPattern("[z-a].yaml")).toBe(false);
    expect(isValidPattern("/")).toBe(false);
  });
});
