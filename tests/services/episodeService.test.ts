import { describe, it, expect } from "vitest";
import {
  extractDescription,
  extractMediaUrl,
  extractTitle,
  MAX_DESCRIPTION_LENGTH,
  truncateDescription,
} from "../../src/services/business/episodeService.js";
import { FieldMissingError } from "../../src/utils/errors.js";
import { parseXml } from "../../src/utils/xmlTree.js";

const PILOT = parseXml(
  `<item><title>Pilot</title><description>  First one  </description>` +
    `<enclosure url="https://cdn.example.com/pilot.mp3"/></item>`
);

describe("extractTitle", () => {
  it("reads the title text", () => {
    expect(extractTitle(PILOT, "title")).toBe("Pilot");
  });

  it("requires a non-empty title", () => {
    const missing = parseXml(`<item><enclosure url="https://cdn.example.com/a.mp3"/></item>`);
    const empty = parseXml(`<item><title>  </title></item>`);

    expect(() => extractTitle(missing, "title")).toThrow(new FieldMissingError("title"));
    expect(() => extractTitle(missing, "title")).toThrow("Could not find tag 'title' in item");
    expect(() => extractTitle(empty, "title")).toThrow(FieldMissingError);
  });

  it("supports namespaced tags", () => {
    const item = parseXml(`<entry><itunes:title>Custom</itunes:title></entry>`);
    expect(extractTitle(item, "itunes:title")).toBe("Custom");
  });
});

describe("extractDescription", () => {
  it("trims the description", () => {
    expect(extractDescription(PILOT, "description")).toBe("First one");
  });

  it("is empty when the tag is absent or blank", () => {
    const bare = parseXml(`<item><title>Pilot</title><description></description></item>`);

    expect(extractDescription(PILOT, "summary")).toBe("");
    expect(extractDescription(bare, "description")).toBe("");
  });
});

describe("extractMediaUrl", () => {
  it("reads the configured attribute of the media tag", () => {
    const item = parseXml(`<entry><media:content href="https://cdn.example.com/c.m4a"/></entry>`);

    expect(extractMediaUrl(PILOT, "enclosure", "url")).toBe("https://cdn.example.com/pilot.mp3");
    expect(extractMediaUrl(item, "media:content", "href")).toBe("https://cdn.example.com/c.m4a");
  });

  it("requires the media tag and its attribute", () => {
    const noTag = parseXml(`<item><title>A</title></item>`);
    const noAttr = parseXml(`<item><title>A</title><enclosure href="x"/></item>`);

    expect(() => extractMediaUrl(noTag, "enclosure", "url")).toThrow(
      "Could not find tag 'enclosure' in item"
    );
    expect(() => extractMediaUrl(noAttr, "enclosure", "url")).toThrow(
      "Could not find media attribute 'url' in tag 'enclosure'"
    );
  });
});

describe("truncateDescription", () => {
  it("keeps descriptions up to the limit", () => {
    const text = "x".repeat(MAX_DESCRIPTION_LENGTH);
    expect(truncateDescription(text)).toBe(text);
  });

  it("cuts longer descriptions and marks the cut", () => {
    const result = truncateDescription("y".repeat(MAX_DESCRIPTION_LENGTH + 1));
    expect(result).toBe(`${"y".repeat(MAX_DESCRIPTION_LENGTH)}...`);
  });
});
