/**
 * @module projector
 *
 * Read-only views over an assembled forest: heading annotations and table of
 * contents projections. Nothing here stores state; every call walks the
 * forest again, so two projections of one forest always agree.
 */
import type { HeadingFormat, HeadingMarkup } from "./heading-formats.ts";
import {
  type DocumentNode,
  isStructural,
  type StructuralDocumentNode,
  type TocDepth,
  type TocEntry,
  type TocStyle,
} from "./model.ts";

const tocStyle = (node: StructuralDocumentNode): TocStyle =>
  node.nature === "pannasaka"
    ? "pannasaka"
    : node.role === "chapter"
    ? "chapter"
    : "default";

export const tocEntry = (node: StructuralDocumentNode): TocEntry => ({
  nodeId: node.segment.id,
  displayTitle: node.segment.title,
  level: node.headingLevel,
  depth: node.depth,
  style: tocStyle(node),
  collapsed: node.collapsed,
});

const withinCutoff = (depth: number, maxDepth: TocDepth) =>
  maxDepth === "all" || depth <= maxDepth;

function* walkStructural(
  nodes: readonly DocumentNode[],
  maxDepth: TocDepth,
): Generator<StructuralDocumentNode> {
  for (const node of nodes) {
    // children are always deeper than their parent, so the subtree can be cut
    if (!isStructural(node) || !withinCutoff(node.depth, maxDepth)) continue;
    yield node;
    yield* walkStructural(node.children, maxDepth);
  }
}

/**
 * Table of contents entries in document order, for structural nodes with
 * `depth <= maxDepth`. The result is lazy and can be iterated any number of
 * times.
 */
export function project(
  forest: readonly DocumentNode[],
  maxDepth: TocDepth,
): Iterable<TocEntry> {
  if (maxDepth !== "all" && (!Number.isInteger(maxDepth) || maxDepth < 0)) {
    throw new RangeError(`TOC depth must be "all" or a non-negative integer`);
  }
  return {
    *[Symbol.iterator]() {
      for (const node of walkStructural(forest, maxDepth)) {
        yield tocEntry(node);
      }
    },
  };
}

export interface TocDepths {
  readonly mainDepth: TocDepth;
  readonly secondaryDepth: number;
}

export interface VolumeTocs {
  readonly main: readonly TocEntry[];
  readonly secondary: readonly TocEntry[];
}

/**
 * Main and secondary TOCs of one forest. The secondary cutoff must be shallower
 * than the main one.
 */
export function tocs(
  forest: readonly DocumentNode[],
  depths: TocDepths,
): VolumeTocs {
  const { mainDepth, secondaryDepth } = depths;
  if (mainDepth !== "all" && secondaryDepth >= mainDepth) {
    throw new RangeError(
      `secondary TOC depth ${secondaryDepth} must be shallower than main depth ${mainDepth}`,
    );
  }
  return {
    main: Array.from(project(forest, mainDepth)),
    secondary: Array.from(project(forest, secondaryDepth)),
  };
}

export interface HeadingAnnotation {
  readonly nodeId: string;
  readonly level: number;
  readonly depth: number;
  readonly collapsed: boolean;
  readonly markup: HeadingMarkup;
}

/** One annotation per structural node, in document order. */
export function headings(
  forest: readonly DocumentNode[],
  format: HeadingFormat,
): HeadingAnnotation[] {
  return Array.from(walkStructural(forest, "all"), (node) => ({
    nodeId: node.segment.id,
    level: node.headingLevel,
    depth: node.depth,
    collapsed: node.collapsed,
    markup: format.markup(node),
  }));
}

export interface SecondaryTocTarget {
  readonly target: TocEntry;
  readonly entries: readonly TocEntry[];
}

/**
 * For every structural node at exactly `depth`, the TOC of its own structural
 * descendants. Used to give each part of a book a local contents page.
 */
export function secondaryTocTargets(
  forest: readonly DocumentNode[],
  depth: number,
): SecondaryTocTarget[] {
  return Array.from(walkStructural(forest, depth))
    .filter((node) => node.depth === depth)
    .map((node) => ({
      target: tocEntry(node),
      entries: Array.from(walkStructural(node.children, "all"), tocEntry),
    }));
}
