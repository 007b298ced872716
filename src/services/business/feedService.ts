/**
 * Feed Service
 * Fetches the podcast feed, parses it and picks the episodes to post.
 */

import { decodeXml, findAll, parseXml, type XmlNode } from "../../utils/xmlTree.js";
import { FetchError } from "../../utils/errors.js";

/**
 * Fetches the feed document, decoded per its XML declaration.
 * Throws FetchError on transport failure or a non-2xx status.
 */
export async function fetchFeed(url: string): Promise<string> {
  console.log(`[feed] Fetching RSS feed from: ${url}`);

  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new FetchError(url, error);
  }

  if (!response.ok) {
    throw new FetchError(url, undefined, response.status);
  }

  return decodeXml(new Uint8Array(await response.arrayBuffer()));
}

/**
 * Parses the feed and returns the nodes matching `rootPath`.
 * Throws ParseError on malformed XML; an empty result is not an error.
 */
export function findEpisodeNodes(xml: string, rootPath: string): XmlNode[] {
  const root = parseXml(xml);
  return findAll(root, rootPath);
}

/**
 * Takes the `count` newest nodes (feeds list newest first) and returns them
 * oldest first, so posts land in chronological order.
 */
export function selectEpisodes<T>(nodes: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  return nodes.slice(0, count).reverse();
}
