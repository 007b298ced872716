/**
 * Episode Service
 * Reads the title, description and media URL out of an episode node.
 */

import { findFirst, type XmlNode } from "../../utils/xmlTree.js";
import { FieldMissingError } from "../../utils/errors.js";

/** Keeps webhook messages readable */
export const MAX_DESCRIPTION_LENGTH = 1000;

/**
 * Trimmed text of the first `titleTag` element.
 * Throws FieldMissingError when it is absent or empty.
 */
export function extractTitle(node: XmlNode, titleTag: string): string {
  const title = findFirst(node, titleTag)?.text;
  if (!title) {
    throw new FieldMissingError(titleTag);
  }
  return title;
}

export function extractDescription(node: XmlNode, descriptionTag: string): string {
  return truncateDescription(findFirst(node, descriptionTag)?.text ?? "");
}

/**
 * Value of `mediaAttr` on the first `mediaTag` element.
 * Throws FieldMissingError when either is absent.
 */
export function extractMediaUrl(node: XmlNode, mediaTag: string, mediaAttr: string): string {
  const media = findFirst(node, mediaTag);
  if (!media) {
    throw new FieldMissingError(mediaTag);
  }
  const url = media.attributes[mediaAttr];
  if (!url) {
    throw new FieldMissingError(mediaTag, mediaAttr);
  }
  return url;
}

export function truncateDescription(description: string): string {
  const trimmed = description.trim();
  if (trimmed.length <= MAX_DESCRIPTION_LENGTH) {
    return trimmed;
  }
  return `${trimmed.slice(0, MAX_DESCRIPTION_LENGTH)}...`;
}
