import { describe, it, expect, vi, afterEach } from "vitest";
import fs from "node:fs/promises";
import { DEFAULT_CONCURRENCY, runCheck } from "../guard/engine.js";
import { makeTempDir } from "./helpers.js";

const FILES = Array.from({ length: 20 }, (_, i) => `secret/f${String(i).padStart(2, "0")}.yaml`);

afterEach(() => {
  vi.restoreAllMocks();
});

// Counts readFile calls in flight; each read is held for a few milliseconds so they overlap.
function trackReads() {
  const original = fs.readFile;
  const state = { active: 0, peak: 0, calls: 0 };
  vi.spyOn(fs, "readFile").mockImplementation(async (...args) => {
    state.calls++;
    state.active++;
    state.peak = Math.max(state.peak, state.active);
    try {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return await original(...args);
    } finally {
      state.active--;
    }
  });
  return state;
}

async function makeSecrets() {
  return makeTempDir(Object.fromEntries(FILES.map((f, i) => [f, i % 2 ? "password: test-secret\n" : "$ANSIBLE_VAULT;1.1;AES256\n6162\n"])));
}

describe("runCheck concurrency", () => {
  it("never reads more files at once than the limit", async () => {
    const cwd = await makeSecrets();
    const reads = trackReads();
    const report = await runCheck(FILES, { cwd, policy: "scope", scope: "secret", concurrency: 3 });
    expect(reads.calls).toBe(20);
    expect(reads.peak).toBe(3);
    expect(report.results.map((r) => r.path)).toEqual(FILES);
    expect(report.violations).toEqual(FILES.filter((_, i) => i % 2));
  });

  it("uses the default limit when none is given", async () => {
    const cwd = await makeSecrets();
    const reads = trackReads();
    await runCheck(FILES, { cwd, policy: "scope", scope: "secret" });
    expect(reads.peak).toBe(DEFAULT_CONCURRENCY);
  });
});
