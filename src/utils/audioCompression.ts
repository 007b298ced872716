/**
 * Audio Compression Utility
 * Re-encodes downloaded episodes to a lower-bitrate MP3 so they fit under
 * the webhook's attachment ceiling.
 */

import ffmpeg from "fluent-ffmpeg";
import { stat } from "fs/promises";
import path from "path";
import { FFMPEG_PATH } from "../config/env.js";
import { EncodeError } from "./errors.js";

const BYTES_PER_MB = 1024 * 1024;

if (FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(FFMPEG_PATH);
}

/**
 * Compresses `inputPath` to an MP3 at `bitrate` (e.g. "64k"), overwriting `outputPath`.
 * Rejects with EncodeError if ffmpeg cannot read or encode the source.
 */
export async function compressMp3(
  inputPath: string,
  outputPath: string,
  bitrate: string
): Promise<void> {
  console.log(`[compress] Compressing ${path.basename(inputPath)} with bitrate ${bitrate}...`);

  let lastLoggedPercent = -10;

  try {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .audioCodec("libmp3lame")
        .audioBitrate(bitrate)
        .format("mp3")
        .outputOptions(["-y"])
        .on("start", (line: string) => console.log(`[compress] ffmpeg: ${line}`))
        .on("progress", (p: { percent?: number }) => {
          if (typeof p.percent === "number") {
            // throttle logging to every ~10%
            const rounded = Math.floor(p.percent / 10) * 10;
            if (rounded >= lastLoggedPercent + 10) {
              lastLoggedPercent = rounded;
              console.log(`[compress] Progress: ~${rounded}%`);
            }
          }
        })
        .on("end", () => resolve())
        .on("error", (err: Error) => reject(err))
        .save(outputPath);
    });
  } catch (error) {
    throw new EncodeError(inputPath, error);
  }

  const sizeMb = await getFileSizeMb(outputPath);
  console.log(`[compress] ✓ Output: ${sizeMb.toFixed(2)}MB → ${path.basename(outputPath)}`);
}

/**
 * File size in MB (1 MB = 1024 * 1024 bytes).
 */
export async function getFileSizeMb(filePath: string): Promise<number> {
  const s = await stat(filePath);
  return s.size / BYTES_PER_MB;
}
