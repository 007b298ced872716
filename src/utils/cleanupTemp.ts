/**
 * Cleanup utility for temporary files
 * Runs at the end of every episode, whatever state the episode reached.
 */

import { rm } from "fs/promises";
import path from "path";

/**
 * Removes each path that exists. Never throws; failures are logged.
 */
export async function removeTempFiles(paths: ReadonlyArray<string | null>): Promise<void> {
  for (const filePath of paths) {
    if (!filePath) continue;

    try {
      await rm(filePath, { force: true });
    } catch (err) {
      console.warn(`[cleanup] Failed to remove ${path.basename(filePath)}:`, err);
    }
  }

  console.log("[cleanup] ✓ Cleaned up temporary files");
}
