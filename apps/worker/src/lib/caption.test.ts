import { describe, expect, it } from "vitest";

import { testRuleset } from "./__tests__/fixtures.js";
import { buildCaption, entityHashtag, generateHashtags } from "./caption.js";

describe("generateHashtags", () => {
  it("puts the primary tag first, then topic tags, then keyword tags", () => {
    expect(
      generateHashtags(testRuleset, "Election registration debate", "", ["registration"])
    ).toEqual(["#Election", "#Registration", "#Debate"]);
  });

  it("always includes the primary tag", () => {
    expect(generateHashtags(testRuleset, "Quiet day", "", [])).toEqual(["#Election"]);
  });
});

describe("entityHashtag", () => {
  it("joins multi-word names with underscores", () => {
    expect(entityHashtag(" John  Doe ")).toBe("#John_Doe");
  });
});

describe("buildCaption", () => {
  it("lays out title, tags, handle, description and source", () => {
    const caption = buildCaption(
      testRuleset,
      {
        title: "Smith & Jones debate",
        description: "Long text",
        source: "Daily",
        topics: [],
        entities: ["Smith", "John Doe", "Jones"]
      },
      { maxChars: 1024, channelHandle: "@chan", footer: "bye" }
    );

    expect(caption).toBe(
      "💠 <b>Smith &amp; Jones debate</b>\n\n" +
        "#Election #Debate #Smith #John_Doe\n\n" +
        "@chan\n\n" +
        "Long text\n\n" +
        "📰 Daily\nbye"
    );
  });

  it("shortens only the description when over the limit", () => {
    const caption = buildCaption(
      testRuleset,
      {
        title: "T",
        description: "abcdefghij",
        source: "",
        topics: [],
        entities: []
      },
      { maxChars: 30 }
    );

    expect(caption).toBe("💠 <b>T</b>\n\n#Election\n\nabcde…");
    expect(caption).toHaveLength(30);
  });

  it("cuts the description before escaping so entities stay whole", () => {
    const input = {
      title: "T",
      description: `${"a".repeat(10)}&${"b".repeat(20)}`,
      source: "",
      topics: [],
      entities: []
    };

    expect(buildCaption(testRuleset, input, { maxChars: 40 })).toBe(
      "💠 <b>T</b>\n\n#Election\n\naaaaaaaaaa&amp;…"
    );
    expect(buildCaption(testRuleset, input, { maxChars: 39 })).toBe(
      "💠 <b>T</b>\n\n#Election\n\naaaaaaaaaa…"
    );
  });

  it("drops the description and shortens the title when the title alone is too long", () => {
    const caption = buildCaption(
      testRuleset,
      {
        title: "x".repeat(50),
        description: "d".repeat(50),
        source: "",
        topics: [],
        entities: []
      },
      { maxChars: 30 }
    );

    expect(caption).toBe("💠 <b>xxxxxxxx…</b>\n\n#Election");
    expect(caption).toHaveLength(30);
  });

  it("keeps only the primary hashtag when the tag line cannot fit", () => {
    const caption = buildCaption(
      testRuleset,
      {
        title: "Vote",
        description: "",
        source: "",
        topics: [],
        entities: ["A".repeat(40)]
      },
      { maxChars: 30 }
    );

    expect(caption).toBe("💠 <b>Vote</b>\n\n#Election");
  });

  it("escapes markup in the description", () => {
    const caption = buildCaption(
      testRuleset,
      { title: "Vote", description: "a < b", source: "", topics: [], entities: [] },
      { maxChars: 1024 }
    );

    expect(caption).toBe("💠 <b>Vote</b>\n\n#Election\n\na &lt; b");
  });
});
