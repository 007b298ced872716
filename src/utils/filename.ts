/**
 * Filename utilities for per-episode temp files.
 */

import path from "path";

/** Keeps names well under the ~255 byte limit common to filesystems */
export const MAX_FILENAME_LENGTH = 230;

const ILLEGAL_CHARACTERS = /[\\/*?:"<>|]/g;
const AUDIO_EXTENSION = /^\.[a-z0-9]{2,5}$/i;

/**
 * Turns an episode title into a safe base filename.
 * Example: `Ep 12: "Q&A"?` → `Ep_12_Q&A`
 */
export function sanitizeFilename(name: string): string {
  let sanitized = name.replace(ILLEGAL_CHARACTERS, "").replace(/ /g, "_");
  sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);

  // Don't leave half of a surrogate pair at the cut
  if (/[\uD800-\uDBFF]$/.test(sanitized)) {
    sanitized = sanitized.slice(0, -1);
  }

  return sanitized || "episode";
}

/**
 * Extension of the media URL's path (e.g. "m4a"), or "mp3" when it has none.
 */
export function mediaExtension(mediaUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(mediaUrl).pathname;
  } catch {
    return "mp3";
  }
  const ext = path.posix.extname(pathname);
  return AUDIO_EXTENSION.test(ext) ? ext.slice(1).toLowerCase() : "mp3";
}

export interface EpisodeFilePaths {
  original: string;
  compressed: string;
}

/**
 * Temp file paths for one episode: `<name>.<ext>` and `<name>_compressed.mp3`.
 */
export function episodeFilePaths(
  workDir: string,
  title: string,
  mediaUrl: string
): EpisodeFilePaths {
  const base = sanitizeFilename(title);
  return {
    original: path.join(workDir, `${base}.${mediaExtension(mediaUrl)}`),
    compressed: path.join(workDir, `${base}_compressed.mp3`),
  };
}
