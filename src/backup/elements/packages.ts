import path from "node:path";
import type { RunContext } from "../../context.js";
import type { CaptureResult, ReplayResult } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { LAYOUT } from "../layout.js";
import { readLines, writeLines } from "../../system/fs.js";

/** Full installed-package listing. Advisory only: replay reports it, never reinstalls from it. */
export class PackagesBackend implements ElementBackend {
  readonly kind = "packages";
  readonly label = "installed package list";

  constructor(private readonly ctx: RunContext) {}

  async capture(snapshotDir: string): Promise<CaptureResult> {
    this.ctx.reporter.info("Backing up package list...");
    const file = path.join(snapshotDir, LAYOUT.packagesList);
    const r = await this.ctx.packages.listInstalled();
    if (!r.ok) {
      await writeLines(file, []);
      return { count: 0, warnings: [`Could not list installed packages: ${r.error}`] };
    }
    const packages = r.output.split("\n").map((l) => l.trim()).filter(Boolean).sort();
    await writeLines(file, packages);
    return { count: packages.length, warnings: [] };
  }

  async replay(snapshotDir: string): Promise<ReplayResult> {
    const file = path.join(snapshotDir, LAYOUT.packagesList);
    const count = (await readLines(file)).length;
    return { count, warnings: [], notes: count > 0 ? [`Package list available at: ${file}`] : [] };
  }

  async inspect(snapshotDir: string): Promise<number> {
    return (await readLines(path.join(snapshotDir, LAYOUT.packagesList))).length;
  }
}
