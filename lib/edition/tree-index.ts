/**
 * @module tree-index
 *
 * Loads the published structural skeletons an edition is assembled against and
 * exposes them through one composed, read-only lookup.
 *
 * Two kinds of skeleton exist:
 *
 * - the **super-tree**: a forest covering the whole canon (`sutta → long → dn`),
 *   whose top-level entries have depth 0;
 * - one **collection tree** per text collection (`dn`, `mn`, `pli-tv-bu-vb` …).
 *   Its top-level key *is* the collection id. That key is the container of the
 *   tree, not a node of it, so the key's children have depth 0.
 *
 * Both are accepted in the shape they are published in (keyed form):
 *
 * ```json
 * { "mn": [{ "mn-mulapannasa": [{ "mn-mulapariyayavagga": ["mn1", "mn2"] }] }] }
 * ```
 *
 * and in an explicit form:
 *
 * ```json
 * { "mn": { "children": [{ "id": "mn-mulapannasa", "children": [{ "id": "mn1" }] }] } }
 * ```
 *
 * When the super-tree has a node whose id is a collection id, that collection's
 * tree is mounted beneath it: the collection's top-level nodes continue the
 * super-tree node's ancestor chain.
 *
 * Shape errors, duplicate ids (within one tree, or shared between a collection
 * tree and the super-tree) and ids that repeat one of their own ancestors fail
 * with `MalformedTreeError` while the index is built, before any volume is
 * assembled. Nothing is mutated afterwards, so one index may be read by any
 * number of concurrent volume assemblies.
 */
import { readFile } from "node:fs/promises";
import JSON5 from "json5";
import { z } from "zod";
import {
  MalformedTreeError,
  UnknownNodeError,
  zodIssueLines,
} from "./errors.ts";

/* -------------------------------------------------------------------------- */
/* Types                                                                       */
/* -------------------------------------------------------------------------- */

/** Which skeleton a node was loaded from. */
export type TreeOrigin =
  | { readonly tree: "super" }
  | { readonly tree: "collection"; readonly collectionId: string };

const superOrigin: TreeOrigin = { tree: "super" };
export const SUPER_TREE_ORIGIN = Object.freeze(superOrigin);

/** Label used for the super-tree in `MalformedTreeError.treeId`. */
export const SUPER_TREE_ID = "super-tree";

function collectionOrigin(collectionId: string): TreeOrigin {
  const origin: TreeOrigin = { tree: "collection", collectionId };
  return Object.freeze(origin);
}

export interface TreeNode {
  readonly id: string;
  readonly children: readonly TreeNode[];
  /** Parent id inside the same tree; absent for roots. */
  readonly parent?: string;
  /** Distance from its own tree's top level (0 for roots). */
  readonly treeDepth: number;
  readonly origin: TreeOrigin;
}

export type ExplicitTreeEntry = {
  id: string;
  children?: RawTreeEntry[];
};

export type KeyedTreeEntry = { [id: string]: RawTreeEntry[] };

/** One entry of a published tree document, in either supported shape. */
export type RawTreeEntry = string | ExplicitTreeEntry | KeyedTreeEntry;

/* -------------------------------------------------------------------------- */
/* Schemas                                                                     */
/* -------------------------------------------------------------------------- */

const explicitEntrySchema: z.ZodType<ExplicitTreeEntry> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    children: z.array(treeEntrySchema).optional(),
  }).strict()
);

const keyedEntrySchema: z.ZodType<KeyedTreeEntry> = z.lazy(() =>
  z.record(z.string().min(1), z.array(treeEntrySchema)).refine(
    (r) => Object.keys(r).length === 1,
    { message: "keyed tree entry must have exactly one key" },
  )
);

export const treeEntrySchema: z.ZodType<RawTreeEntry> = z.lazy(() =>
  z.union([z.string().min(1), explicitEntrySchema, keyedEntrySchema])
);

const rootBodySchema = z.union([
  z.array(treeEntrySchema),
  z.object({ children: z.array(treeEntrySchema) }).strict(),
]);

/**
 * A whole tree document: either a bare forest or an object keyed by root id.
 */
export const treeDocumentSchema = z.union([
  z.array(treeEntrySchema),
  z.record(z.string().min(1), rootBodySchema),
]);

export type TreeDocument = z.infer<typeof treeDocumentSchema>;

/* -------------------------------------------------------------------------- */
/* Parsing                                                                     */
/* -------------------------------------------------------------------------- */

const isExplicitEntry = (
  entry: ExplicitTreeEntry | KeyedTreeEntry,
): entry is ExplicitTreeEntry => typeof entry.id === "string";

function entryParts(entry: RawTreeEntry): [string, readonly RawTreeEntry[]] {
  if (typeof entry === "string") return [entry, []];
  if (isExplicitEntry(entry)) return [entry.id, entry.children ?? []];
  // the schema guarantees exactly one key
  const [[id, children]] = Object.entries(entry);
  return [id, children];
}

const bodyEntries = (body: z.infer<typeof rootBodySchema>) =>
  Array.isArray(body) ? body : body.children;

/**
 * Build frozen nodes for a forest of raw entries. Every problem in the tree is
 * collected before failing so a broken skeleton is reported in one go.
 */
function buildForest(
  treeId: string,
  origin: TreeOrigin,
  entries: readonly RawTreeEntry[],
) {
  const byId = new Map<string, TreeNode>();
  const seen = new Set<string>();
  const issues: string[] = [];

  const build = (
    entry: RawTreeEntry,
    parent: string | undefined,
    depth: number,
    trail: readonly string[],
  ): TreeNode => {
    const [id, rawChildren] = entryParts(entry);
    if (trail.includes(id)) {
      issues.push(`cycle: "${id}" repeats its ancestor [${trail.join(" > ")}]`);
    } else if (seen.has(id)) {
      issues.push(`duplicate id "${id}"`);
    }
    seen.add(id);

    const nextTrail = [...trail, id];
    const children = rawChildren.map((c) =>
      build(c, id, depth + 1, nextTrail)
    );
    const node: TreeNode = Object.freeze({
      id,
      children: Object.freeze(children),
      ...(parent === undefined ? null : { parent }),
      treeDepth: depth,
      origin,
    });
    if (!byId.has(id)) byId.set(id, node);
    return node;
  };

  const roots = entries.map((e) => build(e, undefined, 0, []));
  if (issues.length) {
    throw new MalformedTreeError(issues.join("; "), treeId, issues);
  }
  return { roots: Object.freeze(roots), byId };
}

function parseDocument(treeId: string, document: unknown): TreeDocument {
  const parsed = treeDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = zodIssueLines(parsed.error);
    throw new MalformedTreeError(
      `not a valid tree document (${issues[0] ?? "unknown shape"})`,
      treeId,
      issues,
    );
  }
  return parsed.data;
}

/** Parse the canon-wide super-tree. Object keys become roots. */
export function parseSuperTree(document: unknown) {
  const doc = parseDocument(SUPER_TREE_ID, document);
  const entries: RawTreeEntry[] = Array.isArray(doc)
    ? doc
    : Object.entries(doc).map(([id, body]) => ({ [id]: bodyEntries(body) }));
  return buildForest(SUPER_TREE_ID, SUPER_TREE_ORIGIN, entries);
}

/**
 * Parse one collection tree. A keyed document must have exactly one key and it
 * must be the collection id; a bare array is taken as the collection's children.
 */
export function parseCollectionTree(collectionId: string, document: unknown) {
  const origin = collectionOrigin(collectionId);
  const doc = parseDocument(collectionId, document);
  if (Array.isArray(doc)) return buildForest(collectionId, origin, doc);

  const keys = Object.keys(doc);
  if (keys.length !== 1) {
    throw new MalformedTreeError(
      `expected a single root key, found ${keys.length}`,
      collectionId,
    );
  }
  if (keys[0] !== collectionId) {
    throw new MalformedTreeError(
      `root key "${keys[0]}" does not match the collection id`,
      collectionId,
    );
  }
  return buildForest(collectionId, origin, bodyEntries(doc[keys[0]]));
}

/* -------------------------------------------------------------------------- */
/* Index                                                                       */
/* -------------------------------------------------------------------------- */

export interface TreeIndexInit {
  /** Canon-wide skeleton; optional when only collection trees are needed. */
  readonly superTree?: unknown;
  /** Collection id → published tree document. */
  readonly collections: Readonly<Record<string, unknown>>;
}

/**
 * Build the composed index. An id resolves to exactly one node: a collection
 * tree may not reuse an id of the super-tree.
 */
export function treeIndex(init: TreeIndexInit) {
  const superForest = parseSuperTree(init.superTree ?? []);

  const collections = new Map(
    Object.entries(init.collections).map((
      [id, doc],
    ) => [id, parseCollectionTree(id, doc)] as const),
  );

  for (const [collectionId, tree] of collections) {
    const shared = [...tree.byId.keys()].filter((id) =>
      superForest.byId.has(id)
    );
    if (shared.length) {
      const issues = shared.map((id) => `id "${id}" is also in the super-tree`);
      throw new MalformedTreeError(issues.join("; "), collectionId, issues);
    }
  }

  const treeOf = (origin: TreeOrigin) =>
    origin.tree === "super" ? superForest : collections.get(origin.collectionId);

  function find(collectionId: string, nodeId: string): TreeNode | undefined {
    return superForest.byId.get(nodeId) ??
      collections.get(collectionId)?.byId.get(nodeId);
  }

  function lookup(collectionId: string, nodeId: string): TreeNode {
    const node = find(collectionId, nodeId);
    if (!node) throw new UnknownNodeError(nodeId, collectionId);
    return node;
  }

  /** The super-tree node a collection's tree is mounted beneath, if any. */
  const mountOf = (collectionId: string) => superForest.byId.get(collectionId);

  /**
   * Root-first chain of the node's ancestors. A collection tree's chain
   * continues through its mount point in the super-tree.
   */
  function ancestors(collectionId: string, nodeId: string): TreeNode[] {
    const node = lookup(collectionId, nodeId);
    const chain: TreeNode[] = [];
    let tree = treeOf(node.origin);
    let parentId = node.parent;
    let current = node;
    for (;;) {
      if (parentId === undefined) {
        if (current.origin.tree !== "collection") break;
        const mount = mountOf(current.origin.collectionId);
        if (!mount) break;
        chain.push(mount);
        current = mount;
        tree = superForest;
        parentId = mount.parent;
        continue;
      }
      const parent = tree?.byId.get(parentId);
      if (!parent) throw new UnknownNodeError(parentId, collectionId);
      chain.push(parent);
      current = parent;
      parentId = parent.parent;
    }
    return chain.reverse();
  }

  /** Branches of a collection tree whose children are all childless. */
  function terminalBranches(collectionId: string): ReadonlySet<string> {
    const tree = collections.get(collectionId);
    const out = new Set<string>();
    if (!tree) return out;
    for (const node of tree.byId.values()) {
      if (
        node.children.length &&
        node.children.every((c) => c.children.length === 0)
      ) {
        out.add(node.id);
      }
    }
    return out;
  }

  return {
    find,
    lookup,
    ancestors,
    terminalBranches,
    mountOf,
    hasCollection: (collectionId: string) => collections.has(collectionId),
    collectionIds: () => Array.from(collections.keys()),
    superRoots: () => superForest.roots,
    collectionRoots: (collectionId: string) =>
      collections.get(collectionId)?.roots ?? [],
  } as const;
}

export type TreeIndex = ReturnType<typeof treeIndex>;

/* -------------------------------------------------------------------------- */
/* Loading from disk                                                           */
/* -------------------------------------------------------------------------- */

async function readTreeFile(treeId: string, path: string): Promise<unknown> {
  const text = await readFile(path, "utf-8");
  try {
    return JSON5.parse(text);
  } catch (err) {
    throw new MalformedTreeError(
      `cannot parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
      treeId,
    );
  }
}

/** Read the super-tree and collection trees (JSON or JSON5) and index them. */
export async function loadTreeIndex(paths: {
  superTreePath?: string;
  collections: Readonly<Record<string, string>>;
}): Promise<TreeIndex> {
  const superTree = paths.superTreePath === undefined
    ? undefined
    : await readTreeFile(SUPER_TREE_ID, paths.superTreePath);
  const collections: Record<string, unknown> = {};
  for (const [id, path] of Object.entries(paths.collections)) {
    collections[id] = await readTreeFile(id, path);
  }
  return treeIndex({ superTree, collections });
}
