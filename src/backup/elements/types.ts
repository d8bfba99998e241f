import type { CaptureResult, ElementKind, ReplayResult } from "../../types/snapshot.js";

/**
 * One strategy per element kind. capture() reads the live system into a snapshot
 * directory; replay() writes it back. Both report failures as warnings and only
 * throw on programming errors, which callers still convert into warnings.
 */
export interface ElementBackend {
  readonly kind: ElementKind;
  /** Human label used in prompts and summaries. */
  readonly label: string;
  capture(snapshotDir: string): Promise<CaptureResult>;
  replay(snapshotDir: string): Promise<ReplayResult>;
  /** Amount of captured content for this kind (0 = captured but empty, or absent). */
  inspect(snapshotDir: string): Promise<number>;
}
