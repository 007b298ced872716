/**
 * Run Configuration Schema
 * Zod schema validating the parsed command-line values.
 */

import { z } from "zod";
import { compilePath } from "../../utils/xmlPath.js";
import { describeError } from "../../utils/errors.js";

/** Webhook attachment ceiling per server level, in MB */
export const LEVEL_TO_MAX_SIZE_MB = { 1: 25, 2: 50, 3: 100 } as const;

export const BITRATES_KBPS = [32, 48, 64, 96] as const;

const intFlag = (name: string) =>
  z
    .string()
    .regex(/^-?\d+$/, `${name} must be an integer`)
    .transform((value) => parseInt(value, 10));

export const runConfigSchema = z.object({
  url: z.string().url("url must be a valid URL"),
  webhook: z.string().url("webhook must be a valid URL"),
  root: z
    .string()
    .min(1, "root path must not be empty")
    .superRefine((value, ctx) => {
      try {
        compilePath(value);
      } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
      }
    }),
  number: intFlag("number").default("1"),
  quality: intFlag("quality")
    .default("64")
    .refine(
      (value): value is Bitrate => BITRATES_KBPS.some((bitrate) => bitrate === value),
      { message: `quality must be one of ${BITRATES_KBPS.join(", ")}` }
    ),
  level: intFlag("level")
    .default("1")
    .refine((value): value is Level => value in LEVEL_TO_MAX_SIZE_MB, {
      message: "level must be one of 1, 2, 3",
    }),
  embed: z.boolean().default(false),
  title: z.string().min(1).default("title"),
  description: z.string().min(1).optional(),
  media_tag: z.string().min(1).default("enclosure"),
  media_attr: z.string().min(1).default("url"),
});

export type Bitrate = (typeof BITRATES_KBPS)[number];
export type Level = keyof typeof LEVEL_TO_MAX_SIZE_MB;
export type RunConfigInput = z.input<typeof runConfigSchema>;
