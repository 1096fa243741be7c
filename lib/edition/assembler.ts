/**
 * @module assembler
 *
 * Merges a volume's flat segment stream with the tree skeleton into a forest of
 * {@link DocumentNode}s.
 *
 * Nesting is recovered with an ancestor stack keyed by depth. For a branch the
 * stack is popped while its top is at the same depth or deeper; the branch then
 * becomes a child of the new top (or a root when the stack is empty) and is
 * pushed. A leaf is attached to the current top and never pushed. The stack
 * lives in the call, so volumes can be assembled side by side.
 */
import { UnknownNodeError } from "./errors.ts";
import { depthResolver } from "./depth-resolver.ts";
import type { HeadingFormat } from "./heading-formats.ts";
import type {
  BranchSegment,
  DepthConflict,
  DepthResolution,
  DocumentNode,
  LeafSegment,
  VolumeInput,
} from "./model.ts";
import type { DepthOverrides } from "./overrides.ts";
import type { TreeIndex } from "./tree-index.ts";

type Draft =
  | {
    readonly kind: "branch";
    readonly segment: BranchSegment;
    readonly resolution: DepthResolution;
    readonly depth: number;
    readonly children: Draft[];
  }
  | {
    readonly kind: "leaf";
    readonly segment: LeafSegment;
    readonly depth: number;
    readonly children: Draft[];
  };

export interface VolumeStats {
  readonly branches: number;
  readonly leaves: number;
  readonly maxDepth: number;
  readonly collapsed: number;
}

export interface AssembledVolume {
  readonly collectionId: string;
  readonly volume: number;
  readonly title?: string;
  readonly format: HeadingFormat;
  readonly forest: readonly DocumentNode[];
  readonly conflicts: readonly DepthConflict[];
  readonly stats: VolumeStats;
}

export interface AssembleVolumeInit {
  readonly index: TreeIndex;
  readonly volume: VolumeInput;
  readonly overrides: DepthOverrides;
  readonly format: HeadingFormat;
}

const NO_CHILDREN = Object.freeze([] as const);

function freeze(draft: Draft, format: HeadingFormat): DocumentNode {
  const max = format.maxHeadingLevel;
  const headingLevel = Math.min(draft.depth, max);

  if (draft.kind === "leaf") {
    return Object.freeze({
      nature: "leaf",
      segment: draft.segment,
      depth: draft.depth,
      headingLevel,
      collapsed: false,
      children: NO_CHILDREN,
    });
  }

  const children = Object.freeze(draft.children.map((c) => freeze(c, format)));
  const collapsed = draft.depth >= max;
  const { nominalDepth, tag } = draft.resolution;

  if (tag === "pannasaka") {
    return Object.freeze({
      nature: "pannasaka",
      segment: draft.segment,
      depth: draft.depth,
      nominalDepth,
      headingLevel,
      collapsed,
      children,
    });
  }
  return Object.freeze({
    nature: "branch",
    role: tag,
    segment: draft.segment,
    depth: draft.depth,
    nominalDepth,
    headingLevel,
    collapsed,
    children,
  });
}

function collectStats(forest: readonly DocumentNode[]): VolumeStats {
  let branches = 0, leaves = 0, maxDepth = 0, collapsed = 0;
  const walk = (nodes: readonly DocumentNode[]) => {
    for (const node of nodes) {
      if (node.nature === "leaf") leaves++;
      else {
        branches++;
        if (node.collapsed) collapsed++;
      }
      maxDepth = Math.max(maxDepth, node.depth);
      walk(node.children);
    }
  };
  walk(forest);
  return { branches, leaves, maxDepth, collapsed };
}

/**
 * Assemble one volume. Throws `UnknownNodeError`, annotated with the volume
 * number, when a branch id is not in the index.
 */
export function assembleVolume(init: AssembleVolumeInit): AssembledVolume {
  const { index, volume, overrides, format } = init;
  const resolver = depthResolver({
    index,
    collectionId: volume.collectionId,
    volume: volume.volume,
    overrides,
  });

  const roots: Draft[] = [];
  const stack: Draft[] = [];
  const attach = (draft: Draft) => {
    const top = stack.at(-1);
    (top ? top.children : roots).push(draft);
  };

  for (const segment of volume.segments) {
    if (segment.kind === "leaf") {
      const top = stack.at(-1);
      attach({
        kind: "leaf",
        segment,
        depth: top ? top.depth + 1 : 0,
        children: [],
      });
      continue;
    }

    let resolution: DepthResolution;
    try {
      resolution = resolver.resolve(segment.id);
    } catch (err) {
      if (err instanceof UnknownNodeError) throw err.inVolume(volume.volume);
      throw err;
    }

    let top = stack.at(-1);
    while (top && top.depth >= resolution.depth) {
      stack.pop();
      top = stack.at(-1);
    }
    const draft: Draft = {
      kind: "branch",
      segment,
      resolution,
      depth: resolution.depth,
      children: [],
    };
    attach(draft);
    stack.push(draft);
  }

  const forest = Object.freeze(roots.map((d) => freeze(d, format)));
  return Object.freeze({
    collectionId: volume.collectionId,
    volume: volume.volume,
    ...(volume.title === undefined ? null : { title: volume.title }),
    format,
    forest,
    conflicts: resolver.conflicts(),
    stats: collectStats(forest),
  });
}
