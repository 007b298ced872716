import { describe, it, expect } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { removeTempFiles } from "../../src/utils/cleanupTemp.js";

describe("removeTempFiles", () => {
  it("removes existing files and ignores missing ones", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "cleanup-test-"));
    const original = path.join(dir, "Episode.mp3");
    const compressed = path.join(dir, "Episode_compressed.mp3");
    await writeFile(original, "original");
    await writeFile(compressed, "compressed");

    await expect(
      removeTempFiles([original, compressed, path.join(dir, "never-created.mp3"), null])
    ).resolves.toBeUndefined();

    expect(await readdir(dir)).toEqual([]);
    await rm(dir, { recursive: true, force: true });
  });

  it("is a no-op when no files were created", async () => {
    await expect(removeTempFiles([null, null])).resolves.toBeUndefined();
  });
});
