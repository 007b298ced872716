/**
 * Environment Configuration
 * Type-safe environment settings that sit beside the CLI flags.
 * None are required; each falls back to a working default.
 */

import os from "os";
import path from "path";

/** Directory holding each episode's temporary audio files */
export const WORK_DIR = process.env.WORK_DIR || path.join(os.tmpdir(), "podcast-poster");

/** Pause between two episode posts, in milliseconds */
export const EPISODE_DELAY_MS = getNumberEnv("EPISODE_DELAY_MS", 2000);

/** Optional explicit ffmpeg binary; PATH lookup otherwise */
export const FFMPEG_PATH = process.env.FFMPEG_PATH;

/**
 * Reads a non-negative numeric variable.
 * Throws immediately if the value is not a number.
 */
function getNumberEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid numeric environment variable: ${key}=${raw}`);
  }
  return value;
}
