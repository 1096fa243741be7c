import { afterEach, describe, expect, it, vi } from "vitest";
import { UnknownNodeError } from "./errors.ts";
import { renderEditionSummary, verboseInfoEditionEventBus } from "./verbose.ts";
import type { EditionAssembly } from "./edition.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("verboseInfoEditionEventBus (plain)", () => {
  it("prints volume lifecycle lines", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const bus = verboseInfoEditionEventBus({ style: "plain" });

    bus.emit("volume:start", { collectionId: "mn", volume: 1, segments: 12 });
    bus.emit("volume:done", {
      collectionId: "mn",
      volume: 1,
      branches: 3,
      leaves: 9,
      collapsed: 0,
      durationMs: 4.4,
    });
    bus.emit("volume:done", {
      collectionId: "mn",
      volume: 2,
      branches: 3,
      leaves: 9,
      collapsed: 2,
      durationMs: 10.6,
    });

    expect(info.mock.calls).toEqual([
      ["[volume] mn#1 segments=12"],
      ["[volume] mn#1 branches=3 leaves=9 4ms"],
      ["[volume] mn#2 branches=3 leaves=9 collapsed=2 11ms"],
    ]);
  });

  it("prints failures and conflicts", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bus = verboseInfoEditionEventBus({ style: "plain" });

    bus.emit("volume:error", {
      collectionId: "mn",
      volume: 2,
      error: new UnknownNodeError("mn999", "mn", 2),
    });
    bus.emit("depth:conflict", {
      collectionId: "an4",
      volume: 1,
      conflict: {
        nodeId: "an4-pathamapannasaka",
        matched: ["forced-chapter", "pannasaka"],
        applied: "forced-chapter",
      },
    });

    expect(error.mock.calls).toEqual([[
      '[volume] mn#2 UNKNOWN_NODE: Unknown node "mn999" in collection "mn" (volume 2)',
    ]]);
    expect(warn.mock.calls).toEqual([[
      "[depth] an4-pathamapannasaka matched forced-chapter+pannasaka, applied forced-chapter an4#1",
    ]]);
  });
});

describe("renderEditionSummary", () => {
  it("writes one line per volume", () => {
    const log = vi.fn();
    const result: EditionAssembly = {
      assembled: [],
      failures: [{
        collectionId: "mn",
        volume: 2,
        error: new UnknownNodeError("mn999", "mn", 2),
      }],
    };
    renderEditionSummary(result, { style: "plain", out: { log } });
    expect(log.mock.calls).toEqual([[
      "  fail mn#2",
      'Unknown node "mn999" in collection "mn" (volume 2)',
    ]]);
  });
});
