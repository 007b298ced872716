/**
 * Podcast Pipeline
 * One run: fetch the feed, select the newest episodes and post them oldest first.
 * Feed fetch and parse errors propagate and abort the run; episode errors never do.
 */

import type { RunConfig } from "../../config/runConfig.js";
import { fetchFeed, findEpisodeNodes, selectEpisodes } from "./feedService.js";
import { processEpisode, type EpisodeOutcome } from "./processEpisodeService.js";
import { sleep } from "../../utils/sleep.js";

export interface RunSummary {
  /** Nodes matching the root path */
  found: number;
  /** Episodes picked for this run */
  selected: number;
  outcomes: EpisodeOutcome[];
}

/**
 * Runs the whole pipeline once and summarizes what happened to each episode.
 */
export async function runPipeline(config: RunConfig): Promise<RunSummary> {
  console.log(
    `[pipeline] Server level set to ${config.level}, max upload size is ${config.maxSizeMb}MB.`
  );

  const xml = await fetchFeed(config.feedUrl);
  const nodes = findEpisodeNodes(xml, config.rootPath);

  if (nodes.length === 0) {
    console.log(`[pipeline] Could not find any episodes using the root path '${config.rootPath}'.`);
    return { found: 0, selected: 0, outcomes: [] };
  }

  const episodes = selectEpisodes(nodes, config.count);
  console.log(
    `[pipeline] Found ${nodes.length} total episodes. Processing the ${episodes.length} most recent ones.`
  );

  const outcomes: EpisodeOutcome[] = [];
  for (const [index, episode] of episodes.entries()) {
    if (index > 0) {
      // Space out posts so the webhook isn't hit in bursts
      await sleep(config.episodeDelayMs);
    }
    outcomes.push(await processEpisode(episode, config));
  }

  const summary = { found: nodes.length, selected: episodes.length, outcomes };
  console.log(`[pipeline] ${summarize(summary)}`);
  return summary;
}

/**
 * One-line tally, e.g. "Done: 2 posted, 1 skipped, 0 failed".
 */
export function summarize({ outcomes }: RunSummary): string {
  const count = (status: EpisodeOutcome["status"]) =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return `Done: ${count("posted")} posted, ${count("skipped")} skipped, ${count("failed")} failed`;
}
