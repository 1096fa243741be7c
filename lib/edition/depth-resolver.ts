/**
 * @module depth-resolver
 *
 * Decides the render depth and tag of every structural id of one volume.
 *
 * A node's default depth is its tree parent's *resolved* depth plus one, so an
 * override applied to an ancestor carries down to everything beneath it. The
 * parent chain runs through the super-tree when the collection is mounted there. Two
 * override categories may replace the default:
 *
 * - `forced-chapter`: depth 0, tag `chapter`;
 * - `pannasaka`: default depth, tag `pannasaka`.
 *
 * When both match one id, the configured precedence picks the winner and the
 * clash is recorded as a {@link DepthConflict}.
 *
 * One resolver serves one volume. Its memo is private to it, so volumes can be
 * resolved independently against a shared index.
 */
import type {
  DepthConflict,
  DepthResolution,
  DepthTag,
  OverrideCategory,
} from "./model.ts";
import type { DepthOverrides, ForcedChapterRule } from "./overrides.ts";
import type { TreeIndex, TreeNode } from "./tree-index.ts";

export interface DepthResolverInit {
  readonly index: TreeIndex;
  readonly collectionId: string;
  readonly volume: number;
  readonly overrides: DepthOverrides;
}

const ruleCoversVolume = (rule: ForcedChapterRule, volume: number) =>
  rule.volumes === "all" || rule.volumes.includes(volume);

export function depthResolver(init: DepthResolverInit) {
  const { index, collectionId, volume, overrides } = init;

  const rules = overrides.forcedChapters.filter((r) =>
    r.collection === collectionId && ruleCoversVolume(r, volume)
  );
  const forcedIds = new Set<string>();
  for (const rule of rules) {
    const ids = rule.ids ?? index.terminalBranches(collectionId);
    for (const id of ids) forcedIds.add(id);
  }

  const memo = new Map<string, DepthResolution>();
  const conflicts: DepthConflict[] = [];

  function matchedCategories(id: string): OverrideCategory[] {
    const matched: OverrideCategory[] = [];
    for (const category of overrides.precedence) {
      const hit = category === "forced-chapter"
        ? forcedIds.has(id)
        : overrides.pannasakaIds.has(id) || overrides.pannasakaSuffix.test(id);
      if (hit) matched.push(category);
    }
    return matched;
  }

  function resolveNode(
    node: TreeNode,
    parent: DepthResolution | undefined,
  ): DepthResolution {
    const cached = memo.get(node.id);
    if (cached) return cached;

    const defaultDepth = parent ? parent.depth + 1 : 0;
    const insideChapter = parent
      ? parent.tag === "chapter" || parent.insideChapter
      : false;

    const matched = matchedCategories(node.id);
    const [applied] = matched;
    if (matched.length > 1 && applied) {
      conflicts.push({ nodeId: node.id, matched, applied });
    }

    let depth = defaultDepth;
    let tag: DepthTag = insideChapter ? "section" : "default-branch";
    if (applied === "forced-chapter") {
      depth = 0;
      tag = "chapter";
    } else if (applied === "pannasaka") {
      tag = "pannasaka";
    }

    const resolution: DepthResolution = Object.freeze({
      nodeId: node.id,
      depth,
      nominalDepth: parent ? parent.nominalDepth + 1 : 0,
      tag,
      via: applied ?? "default",
      overridden: depth !== defaultDepth,
      insideChapter,
    });
    memo.set(node.id, resolution);
    return resolution;
  }

  /**
   * Resolve one structural id. Throws `UnknownNodeError` when the id, or any
   * ancestor it needs, is not in the index.
   */
  function resolve(nodeId: string): DepthResolution {
    const node = index.lookup(collectionId, nodeId);
    let parent: DepthResolution | undefined;
    for (const ancestor of index.ancestors(collectionId, nodeId)) {
      parent = resolveNode(ancestor, parent);
    }
    return resolveNode(node, parent);
  }

  return {
    resolve,
    /** Every conflict met so far, in resolution order. */
    conflicts: (): readonly DepthConflict[] => [...conflicts],
  } as const;
}

export type DepthResolver = ReturnType<typeof depthResolver>;
