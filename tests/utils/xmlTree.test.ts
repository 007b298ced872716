import { describe, it, expect } from "vitest";
import { decodeXml, findAll, findFirst, parseXml } from "../../src/utils/xmlTree.js";
import { ConfigError, ParseError } from "../../src/utils/errors.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
  <channel>
    <title>Show</title>
    <item>
      <title>Newest</title>
      <itunes:duration>01:02:03</itunes:duration>
      <description><![CDATA[<p>Tom &amp; Jerry</p>]]></description>
      <enclosure url="https://cdn.example.com/2.mp3" length="123" type="audio/mpeg"/>
    </item>
    <item>
      <title>Older &amp; wiser</title>
      <enclosure url="https://cdn.example.com/1.mp3" type="audio/mpeg"/>
    </item>
  </channel>
</rss>`;

describe("parseXml", () => {
  it("returns the document root element", () => {
    const root = parseXml(FEED);
    expect(root.tag).toBe("rss");
    expect(root.attributes.version).toBe("2.0");
    expect(root.children.map((child) => child.tag)).toEqual(["channel"]);
  });

  it("keeps text as strings and decodes entities", () => {
    const root = parseXml(FEED);
    const [newest, older] = findAll(root, "channel/item");
    expect(findFirst(newest, "itunes:duration")?.text).toBe("01:02:03");
    expect(findFirst(older, "title")?.text).toBe("Older & wiser");
  });

  it("decodes numeric character references", () => {
    const item = parseXml(
      `<item><title>Don&#8217;t Panic &#x2014; Ep 1</title>` +
        `<enclosure url="https://cdn.example.com/a.mp3?x=1&amp;y=2"/></item>`
    );
    expect(findFirst(item, "title")?.text).toBe("Don\u2019t Panic \u2014 Ep 1");
    expect(findFirst(item, "enclosure")?.attributes.url).toBe("https://cdn.example.com/a.mp3?x=1&y=2");
  });

  it("reads CDATA content verbatim", () => {
    const root = parseXml(FEED);
    expect(findFirst(root, "channel/item/description")?.text).toBe("<p>Tom &amp; Jerry</p>");
  });

  it("exposes attributes of self-closing elements", () => {
    const root = parseXml(FEED);
    const enclosure = findFirst(root, "channel/item/enclosure");
    expect(enclosure?.attributes).toEqual({
      url: "https://cdn.example.com/2.mp3",
      length: "123",
      type: "audio/mpeg",
    });
    expect(enclosure?.children).toEqual([]);
  });

  it("rejects malformed documents", () => {
    expect(() => parseXml("<rss><channel></rss>")).toThrow(ParseError);
  });
});

describe("findAll", () => {
  const root = parseXml(FEED);
  const titles = (path: string) => findAll(root, path).map((node) => node.text);

  it("follows relative child paths", () => {
    expect(titles("channel/item/title")).toEqual(["Newest", "Older & wiser"]);
    expect(titles("./channel/item/title")).toEqual(["Newest", "Older & wiser"]);
  });

  it("matches any child with *", () => {
    expect(findAll(root, "*/item")).toHaveLength(2);
  });

  it("searches descendants with //", () => {
    expect(titles(".//title")).toEqual(["Show", "Newest", "Older & wiser"]);
    expect(findAll(root, "//item")).toHaveLength(2);
  });

  it("anchors absolute paths at the document root", () => {
    expect(findAll(root, "/rss/channel/item")).toHaveLength(2);
    expect(findAll(root, "/feed/entry")).toEqual([]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(findAll(root, "channel/entry")).toEqual([]);
  });

  it("picks children by position", () => {
    expect(titles("channel/item[1]/title")).toEqual(["Newest"]);
    expect(titles("channel/item[2]/title")).toEqual(["Older & wiser"]);
    expect(titles("channel/item[3]/title")).toEqual([]);
    expect(titles("channel/item[last()]/title")).toEqual(["Older & wiser"]);
    expect(titles("channel/item[last()-1]/title")).toEqual(["Newest"]);
    expect(titles(".//item[2]/title")).toEqual(["Older & wiser"]);
  });

  it("filters on child elements and their text", () => {
    expect(titles("channel/item[description]/title")).toEqual(["Newest"]);
    expect(titles("channel/item[itunes:duration]/title")).toEqual(["Newest"]);
    expect(titles("channel/item[title='Older & wiser']/title")).toEqual(["Older & wiser"]);
    expect(titles("channel/item/title[.='Newest']")).toEqual(["Newest"]);
  });

  it("filters on attributes", () => {
    const urls = (path: string) => findAll(root, path).map((node) => node.attributes.url);
    expect(urls("channel/item/enclosure[@length]")).toEqual(["https://cdn.example.com/2.mp3"]);
    expect(urls("channel/item/enclosure[@url='https://cdn.example.com/1.mp3']")).toEqual([
      "https://cdn.example.com/1.mp3",
    ]);
    expect(urls(`channel/item/enclosure[@type="audio/mpeg"][2]`)).toEqual([]);
  });

  it("rejects expressions it cannot evaluate", () => {
    expect(() => findAll(root, "channel/item[")).toThrow(ConfigError);
    expect(() => findAll(root, "channel/item[")).toThrow(
      "Invalid path expression 'channel/item[': unbalanced brackets"
    );
    expect(() => findAll(root, "channel/item[position()=1]")).toThrow(
      "Invalid path expression 'channel/item[position()=1]': unsupported predicate '[position()=1]'"
    );
    expect(() => findAll(root, "channel/item[0]")).toThrow("positions start at 1");
    expect(() => findAll(root, "../item")).toThrow("parent steps are not supported");
    expect(() => findAll(root, "{urn:x}item")).toThrow("'{urn:x}item' is not a tag name");
  });
});

describe("decodeXml", () => {
  it("follows the encoding in the XML declaration", () => {
    const bytes = Buffer.from(
      `<?xml version="1.0" encoding="ISO-8859-1"?><rss><title>Caf\u00e9</title></rss>`,
      "latin1"
    );
    expect(bytes.includes(0xe9)).toBe(true);

    const root = parseXml(decodeXml(bytes));
    expect(findFirst(root, "title")?.text).toBe("Caf\u00e9");
  });

  it("reads documents without a declaration as UTF-8", () => {
    const xml = "<rss><title>Caf\u00e9 \u2615</title></rss>";
    expect(decodeXml(Buffer.from(xml, "utf8"))).toBe(xml);
  });

  it("falls back to UTF-8 for an unknown encoding", () => {
    const xml = `<?xml version="1.0" encoding="x-no-such-charset"?><rss>\u00e9</rss>`;
    expect(decodeXml(Buffer.from(xml, "utf8"))).toBe(xml);
  });
});
