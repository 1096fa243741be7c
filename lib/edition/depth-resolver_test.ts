import { describe, expect, it } from "vitest";
import { depthResolver } from "./depth-resolver.ts";
import { UnknownNodeError } from "./errors.ts";
import { compileOverrides, type OverrideConfigInput } from "./overrides.ts";
import { treeIndex } from "./tree-index.ts";

const index = treeIndex({
  superTree: [{ sutta: [{ middle: ["mn"] }] }],
  collections: {
    bookA: {
      bookA: {
        children: [
          { id: "ch1" },
          {
            id: "ch2",
            children: [{ id: "ch2.1", children: [{ id: "ch2.1.1" }] }],
          },
        ],
      },
    },
    an4: {
      an4: [
        { "an4-pathamapannasaka": [{ "an4-bhandagamavagga": ["an4.1"] }] },
        { "an4-dutiyapannasaka": [{ "an4-pattakammavagga": ["an4.61"] }] },
      ],
    },
  },
});

const resolverFor = (
  collectionId: string,
  config: OverrideConfigInput = {},
  volume = 1,
) =>
  depthResolver({
    index,
    collectionId,
    volume,
    overrides: compileOverrides(config, { index }),
  });

describe("depthResolver: default depth", () => {
  it("derives depth from the tree", () => {
    const r = resolverFor("bookA");
    expect(r.resolve("ch1")).toEqual({
      nodeId: "ch1",
      depth: 0,
      nominalDepth: 0,
      tag: "default-branch",
      via: "default",
      overridden: false,
      insideChapter: false,
    });
    expect(r.resolve("ch2.1.1").depth).toBe(2);
  });

  it("resolves super-tree ids through their own ancestors", () => {
    expect(resolverFor("mn").resolve("mn").depth).toBe(2);
  });

  it("propagates UnknownNodeError", () => {
    expect(() => resolverFor("bookA").resolve("ch3")).toThrowError(
      UnknownNodeError,
    );
  });

  it("memoises resolutions", () => {
    const r = resolverFor("bookA");
    expect(r.resolve("ch2.1")).toBe(r.resolve("ch2.1"));
  });
});

describe("depthResolver: forced chapters", () => {
  it("forces listed ids to depth 0 and accumulates below them", () => {
    const r = resolverFor("bookA", {
      forcedChapters: [{ collection: "bookA", ids: ["ch2.1"] }],
    });
    expect(r.resolve("ch2.1")).toEqual({
      nodeId: "ch2.1",
      depth: 0,
      nominalDepth: 1,
      tag: "chapter",
      via: "forced-chapter",
      overridden: true,
      insideChapter: false,
    });
    expect(r.resolve("ch2.1.1")).toMatchObject({
      depth: 1,
      nominalDepth: 2,
      tag: "section",
      insideChapter: true,
      overridden: false,
    });
    // the parent keeps its own depth
    expect(r.resolve("ch2").depth).toBe(0);
  });

  it("targets terminal branches when no ids are given", () => {
    const r = resolverFor("bookA", { forcedChapters: [{ collection: "bookA" }] });
    expect(r.resolve("ch2.1").tag).toBe("chapter");
    expect(r.resolve("ch2").tag).toBe("default-branch");
  });

  it("only applies to the listed volumes", () => {
    const config = {
      forcedChapters: [{ collection: "bookA", volumes: [2], ids: ["ch2.1"] }],
    };
    expect(resolverFor("bookA", config, 1).resolve("ch2.1").depth).toBe(1);
    expect(resolverFor("bookA", config, 2).resolve("ch2.1").depth).toBe(0);
  });

  it("only applies to its own collection", () => {
    const r = resolverFor("an4", {
      forcedChapters: [{ collection: "bookA", ids: ["an4-bhandagamavagga"] }],
    });
    expect(r.resolve("an4-bhandagamavagga").tag).toBe("default-branch");
  });
});

describe("depthResolver: pannasaka", () => {
  it("tags ids matching the suffix and keeps their depth", () => {
    const r = resolverFor("an4");
    expect(r.resolve("an4-pathamapannasaka")).toMatchObject({
      depth: 0,
      tag: "pannasaka",
      via: "pannasaka",
      overridden: false,
    });
    expect(r.resolve("an4-bhandagamavagga")).toMatchObject({
      depth: 1,
      tag: "default-branch",
    });
  });

  it("tags ids from the allow-list", () => {
    const r = resolverFor("bookA", { pannasaka: { ids: ["ch2"] } });
    expect(r.resolve("ch2").tag).toBe("pannasaka");
    expect(r.resolve("ch1").tag).toBe("default-branch");
  });
});

describe("depthResolver: conflicts", () => {
  const both = {
    forcedChapters: [{ collection: "an4", ids: ["an4-dutiyapannasaka"] }],
  };

  it("applies the default precedence and records the clash", () => {
    const r = resolverFor("an4", both);
    expect(r.resolve("an4-dutiyapannasaka").tag).toBe("chapter");
    r.resolve("an4-dutiyapannasaka");
    expect(r.conflicts()).toEqual([{
      nodeId: "an4-dutiyapannasaka",
      matched: ["forced-chapter", "pannasaka"],
      applied: "forced-chapter",
    }]);
  });

  it("honours a reversed precedence", () => {
    const r = resolverFor("an4", {
      ...both,
      precedence: ["pannasaka", "forced-chapter"],
    });
    expect(r.resolve("an4-dutiyapannasaka")).toMatchObject({
      tag: "pannasaka",
      depth: 0,
    });
    expect(r.conflicts()).toEqual([{
      nodeId: "an4-dutiyapannasaka",
      matched: ["pannasaka", "forced-chapter"],
      applied: "pannasaka",
    }]);
  });

  it("records nothing when categories do not overlap", () => {
    const r = resolverFor("an4");
    r.resolve("an4-pattakammavagga");
    expect(r.conflicts()).toEqual([]);
  });
});
