/**
 * Custom Application Errors
 * Domain-specific error classes for the feed → webhook pipeline.
 */

/**
 * Base application error class.
 * All pipeline errors extend this.
 */
export class AppError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Network or HTTP failure while fetching the feed.
 */
export class FetchError extends AppError {
  constructor(
    url: string,
    cause?: unknown,
    public readonly status?: number
  ) {
    super(
      `Failed to fetch ${url}: ${status !== undefined ? `HTTP ${status}` : describeError(cause)}`,
      cause
    );
  }
}

/**
 * Network or HTTP failure while downloading an episode's media.
 */
export class DownloadError extends FetchError {}

/**
 * Feed body is not well-formed XML.
 */
export class ParseError extends AppError {
  constructor(detail: string, cause?: unknown) {
    super(`Failed to parse feed XML: ${detail}`, cause);
  }
}

/**
 * Required tag or attribute absent from an episode node.
 */
export class FieldMissingError extends AppError {
  constructor(
    public readonly tag: string,
    public readonly attribute?: string
  ) {
    super(
      attribute
        ? `Could not find media attribute '${attribute}' in tag '${tag}'`
        : `Could not find tag '${tag}' in item`
    );
  }
}

/**
 * ffmpeg could not transcode the source audio.
 */
export class EncodeError extends AppError {
  constructor(inputPath: string, cause?: unknown) {
    super(`Could not compress ${inputPath}: ${describeError(cause)}`, cause);
  }
}

/**
 * Webhook answered outside the success set, or never answered.
 */
export class PublishError extends AppError {
  constructor(
    public readonly status: number | null,
    public readonly body: string
  ) {
    super(`Webhook upload failed with status ${status ?? "N/A"}`);
  }
}

/**
 * Invalid command-line arguments.
 */
export class ConfigError extends AppError {}

/**
 * Renders any thrown value as a single log-friendly line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined || error === null) return "Unknown error";
  return String(error);
}
