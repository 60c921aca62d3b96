import { execFileSync } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export type Tree = Record<string, string | Uint8Array>;

export async function makeTempDir(tree: Tree = {}): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sealcheck-test-"));
  await writeTree(dir, tree);
  return dir;
}

export async function writeTree(dir: string, tree: Tree) {
  for (const [rel, content] of Object.entries(tree)) {
    const abs = path.join(dir, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
}

export function runGit(args: string[], cwd: string) {
  return execFileSync("git", args, { cwd, encoding: "utf8", stdio: ["ignore", "pipe", "pipe"] }).trim();
}

// Repository with `tree` committed on main. The path is resolved so it compares equal to `git rev-parse` output.
export async function makeTempRepo(tree: Tree = {}): Promise<string> {
  const tmp = await fs.realpath(await makeTempDir({ "README.md": "# temp\n", ...tree }));
  runGit(["init"], tmp);
  runGit(["config", "user.email", "test@example.com"], tmp);
  runGit(["config", "user.name", "Test User"], tmp);
  runGit(["config", "commit.gpgsign", "false"], tmp);
  runGit(["add", "."], tmp);
  runGit(["commit", "-m", "init"], tmp);
  runGit(["branch", "-M", "main"], tmp);
  return tmp;
}

export function stripAnsi(s: string): string {
  return s.replace(/\u001b\[[0-9;]*m/g, "");
}

// git-crypt file header: NUL "GITCRYPT" NUL followed by the nonce and ciphertext
export function gitCryptBlob(): Buffer {
  return Buffer.concat([Buffer.from([0]), Buffer.from("GITCRYPT"), Buffer.from([0, 0x9a, 0x3c, 0x71, 0xee, 0x02])]);
}
