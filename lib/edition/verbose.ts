// verbose.ts
import pc from "picocolors";
import { eventBus } from "../universal/event-bus.ts";
import type { EditionAssembly, EditionBusEvents } from "./edition.ts";

export type VerboseStyle = "plain" | "rich";

function palette(style: VerboseStyle) {
  const fancy = style === "rich";

  const E = {
    books: "📚",
    check: "✅",
    boom: "💥",
    split: "🔀",
    timer: "⏱️",
  } as const;

  const c = {
    tag: (s: string) => (fancy ? pc.bold(pc.magenta(s)) : s),
    id: (s: string) => (fancy ? pc.bold(pc.cyan(s)) : s),
    ok: (s: string) => (fancy ? pc.green(s) : s),
    warn: (s: string) => (fancy ? pc.yellow(s) : s),
    err: (s: string) => (fancy ? pc.red(s) : s),
    faint: (s: string) => (fancy ? pc.dim(s) : s),
  };

  const em = {
    start: (s: string) => (fancy ? `${E.books} ${s}` : s),
    done: (s: string) => (fancy ? `${E.check} ${s}` : s),
    error: (s: string) => (fancy ? `${E.boom} ${s}` : s),
    conflict: (s: string) => (fancy ? `${E.split} ${s}` : s),
    timer: (ms: number) =>
      fancy ? ` ${E.timer} ${Math.round(ms)}ms` : ` ${Math.round(ms)}ms`,
  };

  return { c, em };
}

const volumeLabel = (collectionId: string, volume: number) =>
  `${collectionId}#${volume}`;

/**
 * An edition event bus that prints every lifecycle event to the console.
 * `plain` writes bare text; `rich` adds colors and emoji.
 */
export function verboseInfoEditionEventBus(init: { style: VerboseStyle }) {
  const { c, em } = palette(init.style);
  const bus = eventBus<EditionBusEvents>();

  // ---- listeners ----
  bus.on("volume:start", ({ collectionId, volume, segments }) => {
    console.info(
      `${c.tag("[volume]")} ${em.start(c.id(volumeLabel(collectionId, volume)))} ` +
        c.faint(`segments=${segments}`),
    );
  });

  bus.on("volume:done", (d) => {
    console.info(
      `${c.tag("[volume]")} ${em.done(c.id(volumeLabel(d.collectionId, d.volume)))} ` +
        c.ok(`branches=${d.branches} leaves=${d.leaves}`) +
        (d.collapsed ? " " + c.warn(`collapsed=${d.collapsed}`) : "") +
        em.timer(d.durationMs),
    );
  });

  bus.on("volume:error", ({ collectionId, volume, error }) => {
    console.error(
      `${c.tag("[volume]")} ${em.error(c.id(volumeLabel(collectionId, volume)))} ` +
        c.err(`${error.code}: ${error.message}`),
    );
  });

  bus.on("depth:conflict", ({ collectionId, volume, conflict }) => {
    console.warn(
      `${c.tag("[depth]")} ${em.conflict(c.id(conflict.nodeId))} ` +
        c.warn(`matched ${conflict.matched.join("+")}, applied ${conflict.applied}`) +
        " " + c.faint(volumeLabel(collectionId, volume)),
    );
  });

  return bus;
}

/** One line per volume: assembled ones first, then failures. */
export function renderEditionSummary(
  result: EditionAssembly,
  options?: {
    style?: VerboseStyle;
    out?: { log: (...a: unknown[]) => void };
  },
) {
  const { c } = palette(options?.style ?? "rich");
  const out = options?.out ?? console;
  for (const v of result.assembled) {
    out.log(
      `  ok   ${volumeLabel(v.collectionId, v.volume)}`,
      c.ok(
        `${v.stats.branches} branches, ${v.stats.leaves} leaves, ` +
          `${v.toc.main.length} toc entries`,
      ),
    );
  }
  for (const f of result.failures) {
    out.log(
      `  fail ${volumeLabel(f.collectionId, f.volume)}`,
      c.err(f.error.message),
    );
  }
}
