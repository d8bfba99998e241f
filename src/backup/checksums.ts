// SHA256SUMS manifests in sha256sum(1) format: "<hex digest>  <file name>" per line.
import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

export async function sha256File(file: string): Promise<string> {
  const hash = createHash("sha256");
  hash.update(await fs.readFile(file));
  return hash.digest("hex");
}

export async function writeChecksums(dir: string, files: readonly string[], manifestName: string): Promise<void> {
  const lines: string[] = [];
  for (const name of [...files].sort()) {
    lines.push(`${await sha256File(path.join(dir, name))}  ${name}`);
  }
  await fs.writeFile(path.join(dir, manifestName), `${lines.join("\n")}\n`, "utf-8");
}

export interface ChecksumReport {
  readonly verified: string[];
  readonly mismatched: string[];
  readonly missing: string[];
}

/** Verify files listed in a manifest; null when there is no manifest. */
export async function verifyChecksums(dir: string, manifestName: string): Promise<ChecksumReport | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(dir, manifestName), "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }

  const report: ChecksumReport = { verified: [], mismatched: [], missing: [] };
  for (const line of raw.split("\n")) {
    const match = line.match(/^([0-9a-f]{64})\s+\*?(.+)$/);
    if (!match) continue;
    const [, expected, name] = match;
    const file = path.join(dir, path.basename(name));
    try {
      if ((await sha256File(file)) === expected) report.verified.push(name);
      else report.mismatched.push(name);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
      report.missing.push(name);
    }
  }
  return report;
}
