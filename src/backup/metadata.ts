// Metadata ledger: the metadata.json descriptor every snapshot carries.
// Field names are snake_case because older snapshots and imported archives use them.
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { RunContext } from "../context.js";
import type { ElementKind, MetadataDescriptor } from "../types/snapshot.js";
import { ELEMENT_KINDS } from "../types/snapshot.js";
import { ELEMENT_ENTRIES, LAYOUT } from "./layout.js";
import { formatDateTime, formatSnapshotStamp } from "../shared/time.js";
import { listDir, pathExists } from "../system/fs.js";
import { LiberateError, LiberateErrorCode, describeError } from "../shared/errors.js";

const elementKind = z.enum(ELEMENT_KINDS);

// Counts are written as numbers but tolerated as numeric strings in hand-edited files.
const count = z.union([z.number().int().min(0), z.string().regex(/^\d+$/).transform(Number)]);

const descriptorSchema = z.object({
  backup_date: z.string(),
  backup_timestamp: z.string(),
  os_name: z.string(),
  os_id: z.string(),
  os_version: z.string(),
  os_version_major: z.string(),
  hostname: z.string(),
  kernel: z.string(),
  package_count: count,
  release_rpm_count: count,
  script_version: z.string(),
  backed_up_elements: z.array(elementKind).optional(),
});

/** A descriptor as read back, plus whether its captured set had to be inferred. */
export interface StoredDescriptor {
  readonly descriptor: MetadataDescriptor;
  readonly inferred: boolean;
}

/**
 * Build the descriptor for a snapshot whose element payloads are already on disk.
 * Counts are honest: package_count reflects the live system, release_rpm_count the
 * payloads actually captured (0 when release_rpms was excluded or every method failed).
 */
export async function describe(
  ctx: RunContext,
  snapshotDir: string,
  captured: readonly ElementKind[],
  createdAt: Date,
): Promise<MetadataDescriptor> {
  const identity = ctx.identity;
  const installed = await ctx.packages.listInstalledNames();
  const rpms = (await listDir(path.join(snapshotDir, LAYOUT.rpms))).filter((f) => f.endsWith(".rpm"));
  return {
    backup_date: formatDateTime(createdAt),
    backup_timestamp: formatSnapshotStamp(createdAt),
    os_name: identity?.name ?? "unknown",
    os_id: identity?.id ?? "unknown",
    os_version: identity?.version ?? "unknown",
    os_version_major: identity?.versionMajor ?? "unknown",
    hostname: ctx.host.hostname,
    kernel: ctx.host.kernel,
    package_count: installed.length,
    release_rpm_count: rpms.length,
    script_version: ctx.engineVersion,
    backed_up_elements: ELEMENT_KINDS.filter((k) => captured.includes(k)),
  };
}

export async function writeMetadata(snapshotDir: string, descriptor: MetadataDescriptor): Promise<void> {
  await fs.writeFile(path.join(snapshotDir, LAYOUT.metadata), `${JSON.stringify(descriptor, null, 2)}\n`, "utf-8");
}

/**
 * Read and validate metadata.json. Descriptors written before backed_up_elements
 * existed get the set inferred from which payload entries are present.
 */
export async function readMetadata(snapshotDir: string): Promise<StoredDescriptor> {
  const file = path.join(snapshotDir, LAYOUT.metadata);
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (err) {
    throw new LiberateError(LiberateErrorCode.INVALID_SNAPSHOT, `No readable ${LAYOUT.metadata} in ${snapshotDir}`, {
      cause: describeError(err),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new LiberateError(LiberateErrorCode.INVALID_SNAPSHOT, `${file} is not valid JSON`, { cause: describeError(err) });
  }

  const parsed = descriptorSchema.safeParse(json);
  if (!parsed.success) {
    throw new LiberateError(LiberateErrorCode.INVALID_SNAPSHOT, `${file} does not describe a snapshot`, {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  const { backed_up_elements, ...rest } = parsed.data;
  if (backed_up_elements) {
    return { descriptor: { ...rest, backed_up_elements }, inferred: false };
  }
  return { descriptor: { ...rest, backed_up_elements: await inferCaptured(snapshotDir) }, inferred: true };
}

/** Element kinds with at least one payload entry present in the snapshot directory. */
export async function inferCaptured(snapshotDir: string): Promise<ElementKind[]> {
  const found: ElementKind[] = [];
  for (const kind of ELEMENT_KINDS) {
    for (const entry of ELEMENT_ENTRIES[kind]) {
      if (await pathExists(path.join(snapshotDir, entry))) {
        found.push(kind);
        break;
      }
    }
  }
  return found;
}
