import { syncLogger } from "../../logger.js";

import type { CacheSnapshot } from "./builder.js";

/**
 * Holds the snapshot readers are served.
 *
 * Publishing replaces the reference in one assignment; a reader that took
 * `current()` keeps its complete snapshot no matter what is published later.
 */
export class CacheSnapshotHolder {
  private snapshot: CacheSnapshot | null = null;

  /**
   * The latest published snapshot, or null before the first successful cycle.
   */
  current(): CacheSnapshot | null {
    return this.snapshot;
  }

  nextVersion(): number {
    return (this.snapshot?.version ?? 0) + 1;
  }

  publish(snapshot: CacheSnapshot): void {
    const previous = this.snapshot;
    if (previous !== null && snapshot.version <= previous.version) {
      throw new Error(
        `Refusing to publish snapshot ${String(snapshot.version)} over ${String(previous.version)}`
      );
    }

    this.snapshot = snapshot;

    syncLogger.info(
      {
        version: snapshot.version,
        doorEntries: snapshot.door.size,
        machineEntries: snapshot.machine.size,
      },
      "Published cache snapshot"
    );
  }
}
