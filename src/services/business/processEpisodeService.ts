/**
 * Process Episode Service
 * Runs one episode through download → compress → size check → upload,
 * always finishing with cleanup of its temp files.
 */

import { mkdir } from "fs/promises";
import type { RunConfig } from "../../config/runConfig.js";
import type { XmlNode } from "../../utils/xmlTree.js";
import { extractDescription, extractMediaUrl, extractTitle } from "./episodeService.js";
import { downloadToFile } from "./downloadService.js";
import { sendToWebhook } from "../external/webhook.js";
import { compressMp3, getFileSizeMb } from "../../utils/audioCompression.js";
import { removeTempFiles } from "../../utils/cleanupTemp.js";
import { episodeFilePaths } from "../../utils/filename.js";
import {
  describeError,
  DownloadError,
  EncodeError,
  FieldMissingError,
  PublishError,
} from "../../utils/errors.js";

const SUCCESS_STATUSES = new Set([200, 204]);

export type EpisodeOutcome =
  | { status: "posted"; title: string }
  | { status: "skipped"; reason: "missing-field" | "too-large"; title?: string; detail: string }
  | {
      status: "failed";
      stage: "download" | "compress" | "publish" | "unexpected";
      title?: string;
      detail: string;
    };

/**
 * Processes a single episode node. Never throws: every failure becomes an outcome.
 */
export async function processEpisode(node: XmlNode, config: RunConfig): Promise<EpisodeOutcome> {
  let title: string | undefined;
  let originalFile: string | null = null;
  let compressedFile: string | null = null;

  try {
    title = extractTitle(node, config.titleTag);
    const mediaUrl = extractMediaUrl(node, config.mediaTag, config.mediaAttr);
    const description = config.descriptionTag
      ? extractDescription(node, config.descriptionTag)
      : "";

    const files = episodeFilePaths(config.workDir, title, mediaUrl);
    originalFile = files.original;
    compressedFile = files.compressed;

    console.log("-".repeat(50));
    console.log(`[episode] Processing episode: ${title}`);

    await mkdir(config.workDir, { recursive: true });
    await downloadToFile(mediaUrl, originalFile);
    await compressMp3(originalFile, compressedFile, `${config.bitrateKbps}k`);

    const sizeMb = await getFileSizeMb(compressedFile);
    if (sizeMb > config.maxSizeMb) {
      const detail =
        `Compressed file is ${sizeMb.toFixed(2)}MB, ` +
        `over the server's limit of ${config.maxSizeMb}MB`;
      console.warn(`[episode] Warning: ${detail}. Skipping upload.`);
      return { status: "skipped", reason: "too-large", title, detail };
    }

    const response = await sendToWebhook(
      config.webhookUrl,
      { title, description },
      compressedFile,
      config.embed
    );

    if (!response || !SUCCESS_STATUSES.has(response.status)) {
      throw new PublishError(response?.status ?? null, response?.body ?? "No response");
    }

    console.log(`[episode] ✓ Successfully posted '${title}'`);
    return { status: "posted", title };
  } catch (error) {
    return toOutcome(error, title);
  } finally {
    await removeTempFiles([originalFile, compressedFile]);
  }
}

function toOutcome(error: unknown, title: string | undefined): EpisodeOutcome {
  const detail = describeError(error);

  if (error instanceof FieldMissingError) {
    console.error(`[episode] ✗ Error: ${detail}. Skipping.`);
    return { status: "skipped", reason: "missing-field", title, detail };
  }
  if (error instanceof DownloadError) {
    console.error(`[episode] ✗ Error downloading episode '${title}': ${detail}`);
    return { status: "failed", stage: "download", title, detail };
  }
  if (error instanceof EncodeError) {
    console.error(`[episode] ✗ ${detail}`);
    return { status: "failed", stage: "compress", title, detail };
  }
  if (error instanceof PublishError) {
    console.error(`[episode] ✗ Failed to send to webhook. Status code: ${error.status ?? "N/A"}`);
    console.error(`[episode] Response: ${error.body}`);
    return { status: "failed", stage: "publish", title, detail };
  }

  console.error(`[episode] ✗ An unexpected error occurred while processing episode: ${detail}`);
  return { status: "failed", stage: "unexpected", title, detail };
}
