/**
 * Download Service
 * Business service for downloading remote media files.
 */

import { createWriteStream } from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { DownloadError } from "../../utils/errors.js";

/** Write buffer size for streamed downloads */
const CHUNK_SIZE = 8192;

/**
 * Streams a file from `url` straight to `outputPath`.
 * Throws DownloadError on transport failure or a non-2xx status.
 */
export async function downloadToFile(url: string, outputPath: string): Promise<void> {
  console.log(`[download] Downloading audio from: ${url}`);

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new DownloadError(url, error);
  }

  if (!response.ok) {
    throw new DownloadError(url, undefined, response.status);
  }
  if (!response.body) {
    throw new DownloadError(url, new Error("Response has no body"));
  }

  try {
    await pipeline(
      Readable.fromWeb(response.body),
      createWriteStream(outputPath, { highWaterMark: CHUNK_SIZE })
    );
  } catch (error) {
    throw new DownloadError(url, error);
  }

  console.log(`[download] ✓ Audio downloaded and saved as ${outputPath}`);
}
