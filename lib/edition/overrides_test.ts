import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { InvalidOverrideConfigError } from "./errors.ts";
import {
  compileOverrides,
  loadOverrides,
  overridesFromEnv,
  withEnvOverlay,
} from "./overrides.ts";
import { treeIndex } from "./tree-index.ts";

const fixture = (name: string) =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const mnIndex = treeIndex({
  collections: { mn: { mn: [{ "mn-vagga": ["mn1"] }] } },
});

describe("compileOverrides", () => {
  it("fills defaults", () => {
    const o = compileOverrides({});
    expect(o.forcedChapters).toEqual([]);
    expect(o.precedence).toEqual(["forced-chapter", "pannasaka"]);
    expect(o.pannasakaSuffix.source).toBe("(?:pannasaka)$");
    expect(o.pannasakaIds.size).toBe(0);
    expect(o.headingLevels).toEqual({});
  });

  it("anchors the suffix pattern at the end of the id", () => {
    const o = compileOverrides({});
    expect(o.pannasakaSuffix.test("an4-pathamapannasaka")).toBe(true);
    expect(o.pannasakaSuffix.test("an4-pannasaka-vagga")).toBe(false);
    expect(o.pannasakaSuffix.test("mn-mulapannasa")).toBe(false);
  });

  it("accepts an alternative suffix pattern", () => {
    const o = compileOverrides({
      pannasaka: { suffixPattern: "pannasa(?:ka)?" },
    });
    expect(o.pannasakaSuffix.test("mn-mulapannasa")).toBe(true);
    expect(o.pannasakaSuffix.test("an4-pathamapannasaka")).toBe(true);
  });

  it("reports schema failures with their paths", () => {
    try {
      compileOverrides({ forcedChapters: [{ collection: "" }] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOverrideConfigError);
      if (!(err instanceof InvalidOverrideConfigError)) return;
      expect(err.code).toBe("INVALID_OVERRIDE_CONFIG");
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0]).toMatch(/^forcedChapters\.0\.collection: /);
    }
  });

  it("accepts collection ids in any case", () => {
    const index = treeIndex({ collections: { bookA: { bookA: ["ch1"] } } });
    const o = compileOverrides(
      { forcedChapters: [{ collection: "bookA", ids: ["ch1"] }] },
      { index },
    );
    expect(o.forcedChapters).toEqual([
      { collection: "bookA", volumes: "all", ids: ["ch1"] },
    ]);
  });

  it("rejects unknown keys", () => {
    expect(() => compileOverrides({ forcedChapter: [] })).toThrowError(
      InvalidOverrideConfigError,
    );
  });

  it("requires each precedence category exactly once", () => {
    try {
      compileOverrides({ precedence: ["pannasaka", "pannasaka"] });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof InvalidOverrideConfigError)) throw err;
      expect(err.issues).toEqual([
        "precedence: precedence must name each category once",
      ]);
    }
    expect(compileOverrides({ precedence: ["pannasaka", "forced-chapter"] })
      .precedence).toEqual(["pannasaka", "forced-chapter"]);
  });

  it("rejects a suffix pattern that is not a valid expression", () => {
    expect(() => compileOverrides({ pannasaka: { suffixPattern: "(" } }))
      .toThrowError(/^pannasaka suffix pattern "\(" cannot be parsed/);
  });

  it("rejects rules naming a collection the index does not know", () => {
    expect(() =>
      compileOverrides(
        { forcedChapters: [{ collection: "dn" }, { collection: "mn" }] },
        { index: mnIndex },
      )
    ).toThrowError("forced-chapter rules reference unknown collections: dn");
  });

  it("defaults a rule to every volume", () => {
    const o = compileOverrides({ forcedChapters: [{ collection: "mn" }] }, {
      index: mnIndex,
    });
    expect(o.forcedChapters[0]?.volumes).toBe("all");
    expect(o.forcedChapters[0]?.ids).toBeUndefined();
  });
});

describe("environment overlay", () => {
  it("reads ids and suffix", () => {
    expect(overridesFromEnv({
      ADDITIONAL_PANNASAKA_IDS: " a, b ,,",
      EDITION_PANNASAKA_SUFFIX: "pannasa",
    })).toEqual({ pannasaka: { suffixPattern: "pannasa", ids: ["a", "b"] } });
    expect(overridesFromEnv({})).toEqual({});
  });

  it("reads ids written as a list", () => {
    expect(overridesFromEnv({
      ADDITIONAL_PANNASAKA_IDS: '["sn-extra", "an-extra"]',
    })).toEqual({ pannasaka: { ids: ["sn-extra", "an-extra"] } });
  });

  it("turns chapter title settings into forced-chapter rules", () => {
    expect(overridesFromEnv({
      TEXTS_WITH_CHAPTER_SUTTA_TITLES: '{ mn: "all", an4: [1, 3] }',
    })).toEqual({
      forcedChapters: [
        { collection: "mn", volumes: "all" },
        { collection: "an4", volumes: [1, 3] },
      ],
    });
  });

  it("rejects chapter title settings it cannot read", () => {
    expect(() =>
      overridesFromEnv({ TEXTS_WITH_CHAPTER_SUTTA_TITLES: "{ mn: " })
    ).toThrowError(/^TEXTS_WITH_CHAPTER_SUTTA_TITLES cannot be parsed/);
    expect(() =>
      overridesFromEnv({ TEXTS_WITH_CHAPTER_SUTTA_TITLES: "{ mn: 2 }" })
    ).toThrowError(InvalidOverrideConfigError);
  });

  it("extends file ids and rules and replaces the file suffix", () => {
    expect(withEnvOverlay(
      {
        pannasaka: { ids: ["x"], suffixPattern: "old" },
        forcedChapters: [{ collection: "dn" }],
        precedence: [],
      },
      {
        ADDITIONAL_PANNASAKA_IDS: "y",
        EDITION_PANNASAKA_SUFFIX: "new",
        TEXTS_WITH_CHAPTER_SUTTA_TITLES: "{ mn: [2] }",
      },
    )).toEqual({
      pannasaka: { ids: ["x", "y"], suffixPattern: "new" },
      forcedChapters: [
        { collection: "dn" },
        { collection: "mn", volumes: [2] },
      ],
      precedence: [],
    });
  });

  it("leaves the document alone without env settings", () => {
    const doc = { forcedChapters: [] };
    expect(withEnvOverlay(doc, {})).toBe(doc);
  });
});

describe("loadOverrides", () => {
  it("reads a JSON5 file and validates it against the index", async () => {
    const o = await loadOverrides(fixture("overrides.json5"), {
      index: mnIndex,
      env: {},
    });
    expect(o.forcedChapters).toEqual([{ collection: "mn", volumes: [2] }]);
    expect([...o.pannasakaIds]).toEqual(["mn-majjhimapannasa"]);
    expect(o.headingLevels).toEqual({ pdf: 4 });
  });

  it("applies the environment overlay", async () => {
    const o = await loadOverrides(fixture("overrides.json5"), {
      env: { ADDITIONAL_PANNASAKA_IDS: "mn-extra" },
    });
    expect([...o.pannasakaIds]).toEqual(["mn-majjhimapannasa", "mn-extra"]);
  });
});
