import type { RunContext } from "../../context.js";
import type { ElementKind } from "../../types/snapshot.js";
import type { ElementBackend } from "./types.js";
import { PackagesBackend } from "./packages.js";
import { ReposBackend } from "./repos.js";
import { ReleaseFilesBackend } from "./release-files.js";
import { ConfigBackend } from "./config.js";
import { ReleaseRpmsBackend } from "./release-rpms.js";
import { DeletedFilesBackend } from "./deleted-files.js";

export type { ElementBackend } from "./types.js";

/** Backend per element kind. release_rpms is typed concretely for its package-list lookup. */
export interface ElementBackends extends Record<ElementKind, ElementBackend> {
  readonly release_rpms: ReleaseRpmsBackend;
}

export function createElementBackends(ctx: RunContext): ElementBackends {
  return {
    packages: new PackagesBackend(ctx),
    repos: new ReposBackend(ctx),
    release_files: new ReleaseFilesBackend(ctx),
    config: new ConfigBackend(ctx),
    release_rpms: new ReleaseRpmsBackend(ctx),
    deleted_files: new DeletedFilesBackend(ctx),
  };
}
