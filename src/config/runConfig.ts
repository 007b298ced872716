/**
 * Run Configuration
 * Builds the immutable configuration object for one run from argv and env.
 */

import { parseArgs } from "util";
import { ZodError } from "zod";
import { EPISODE_DELAY_MS, WORK_DIR } from "./env.js";
import {
  LEVEL_TO_MAX_SIZE_MB,
  runConfigSchema,
  type Bitrate,
  type Level,
} from "./schemas/runConfigSchema.js";
import { ConfigError } from "../utils/errors.js";

export interface RunConfig {
  readonly feedUrl: string;
  readonly webhookUrl: string;
  /** Path expression selecting episode nodes, relative to the document root */
  readonly rootPath: string;
  readonly count: number;
  readonly bitrateKbps: Bitrate;
  readonly level: Level;
  readonly maxSizeMb: number;
  readonly embed: boolean;
  readonly titleTag: string;
  /** null disables descriptions entirely */
  readonly descriptionTag: string | null;
  readonly mediaTag: string;
  readonly mediaAttr: string;
  readonly workDir: string;
  readonly episodeDelayMs: number;
}

export const USAGE = `Usage: podcast-poster -u <feed-url> -w <webhook-url> -r <root-path> [options]

Fetch podcast episodes from an RSS feed and post them to a chat webhook.

Required:
  -u, --url <url>            The URL of the RSS feed
  -w, --webhook <url>        The webhook URL
  -r, --root <path>          Path to the episode items, e.g. channel/item

Options:
  -n, --number <n>           Number of newest episodes to upload (default: 1)
  -q, --quality <kbps>       Compression bitrate: 32, 48, 64 or 96 (default: 64)
  -l, --level <1|2|3>        Server level: 1=25MB, 2=50MB, 3=100MB (default: 1)
  -e, --embed                Post the title and description as a rich embed
  -t, --title <tag>          Tag holding the episode title (default: title)
  -d, --description <tag>    Tag holding the episode description (omit to skip)
      --media_tag <tag>      Tag holding the media enclosure (default: enclosure)
      --media_attr <attr>    Attribute holding the media URL (default: url)
  -h, --help                 Show this message
`;

/** Flags whose value may be a negative integer, e.g. `-n -1` */
const NUMERIC_FLAGS = new Set(["-n", "--number", "-q", "--quality", "-l", "--level"]);
const NEGATIVE_INTEGER = /^-\d+$/;

export type CliCommand = { kind: "help" } | { kind: "run"; config: RunConfig };

/**
 * Parses command-line arguments into a command.
 * Throws ConfigError on unknown flags or invalid values.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(attachNegativeValues(argv));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), error);
  }

  if (values.help) {
    return { kind: "help" };
  }

  const { help: _help, ...flags } = values;
  const parsed = runConfigSchema.safeParse(flags);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error), parsed.error);
  }

  const input = parsed.data;
  return {
    kind: "run",
    config: Object.freeze({
      feedUrl: input.url,
      webhookUrl: input.webhook,
      rootPath: input.root,
      count: input.number,
      bitrateKbps: input.quality,
      level: input.level,
      maxSizeMb: LEVEL_TO_MAX_SIZE_MB[input.level],
      embed: input.embed,
      titleTag: input.title,
      descriptionTag: input.description ?? null,
      mediaTag: input.media_tag,
      mediaAttr: input.media_attr,
      workDir: WORK_DIR,
      episodeDelayMs: EPISODE_DELAY_MS,
    }),
  };
}

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      url: { type: "string", short: "u" },
      webhook: { type: "string", short: "w" },
      root: { type: "string", short: "r" },
      number: { type: "string", short: "n" },
      quality: { type: "string", short: "q" },
      level: { type: "string", short: "l" },
      embed: { type: "boolean", short: "e" },
      title: { type: "string", short: "t" },
      description: { type: "string", short: "d" },
      media_tag: { type: "string" },
      media_attr: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  }).values;
}

/**
 * Rewrites `-n -1` as `-n-1` and `--number -1` as `--number=-1`, since parseArgs
 * reads a dash-led value as a flag.
 */
function attachNegativeValues(argv: string[]): string[] {
  const args: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if (NUMERIC_FLAGS.has(arg) && next !== undefined && NEGATIVE_INTEGER.test(next)) {
      args.push(arg.startsWith("--") ? `${arg}=${next}` : `${arg}${next}`);
      i++;
      continue;
    }
    args.push(arg);
  }
  return args;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const flag = issue.path.join(".");
      return flag ? `--${flag}: ${issue.message}` : issue.message;
    })
    .join("\n");
}
