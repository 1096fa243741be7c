// model.ts

/* -------------------------------------------------------------------------- */
/* Segments                                                                    */
/* -------------------------------------------------------------------------- */

/** Structural placeholder: a book, chapter or section title with no body. */
export interface BranchSegment {
  readonly kind: "branch";
  readonly id: string;
  readonly title: string;
}

/** Content-bearing unit: verse, paragraph or note markup. */
export interface LeafSegment {
  readonly kind: "leaf";
  readonly id: string;
  readonly html: string;
}

export type Segment = BranchSegment | LeafSegment;

/** The flat, ordered segment stream of one volume. */
export interface VolumeInput {
  readonly collectionId: string;
  /** 1-based volume number inside the publication. */
  readonly volume: number;
  readonly segments: readonly Segment[];
  readonly title?: string;
}

/* -------------------------------------------------------------------------- */
/* Depth                                                                       */
/* -------------------------------------------------------------------------- */

export type DepthTag = "chapter" | "section" | "pannasaka" | "default-branch";

export type OverrideCategory = "forced-chapter" | "pannasaka";

export interface DepthResolution {
  readonly nodeId: string;
  readonly depth: number;
  /** Depth in the published tree, before any override. */
  readonly nominalDepth: number;
  readonly tag: DepthTag;
  /** Category that decided the tag, or `default`. */
  readonly via: OverrideCategory | "default";
  /** Depth was forced instead of derived from the parent. */
  readonly overridden: boolean;
  /** True when the id sits below a node forced to a chapter. */
  readonly insideChapter: boolean;
}

/** Two or more override categories matched the same id. */
export interface DepthConflict {
  readonly nodeId: string;
  readonly matched: readonly OverrideCategory[];
  readonly applied: OverrideCategory;
}

/* -------------------------------------------------------------------------- */
/* Document nodes                                                              */
/* -------------------------------------------------------------------------- */

interface DocumentNodeBase {
  readonly depth: number;
  /** `min(depth, maxHeadingLevel)` for the output format. */
  readonly headingLevel: number;
  /** Depth reached the format's deepest level and shares it with others. */
  readonly collapsed: boolean;
  readonly children: readonly DocumentNode[];
}

export interface BranchDocumentNode extends DocumentNodeBase {
  readonly nature: "branch";
  readonly role: Exclude<DepthTag, "pannasaka">;
  readonly segment: BranchSegment;
  readonly nominalDepth: number;
}

export interface PannasakaDocumentNode extends DocumentNodeBase {
  readonly nature: "pannasaka";
  readonly segment: BranchSegment;
  readonly nominalDepth: number;
}

export interface LeafDocumentNode extends DocumentNodeBase {
  readonly nature: "leaf";
  readonly segment: LeafSegment;
  readonly children: readonly [];
}

export type StructuralDocumentNode = BranchDocumentNode | PannasakaDocumentNode;

export type DocumentNode = StructuralDocumentNode | LeafDocumentNode;

export const isStructural = (
  node: DocumentNode,
): node is StructuralDocumentNode => node.nature !== "leaf";

/* -------------------------------------------------------------------------- */
/* Table of contents                                                           */
/* -------------------------------------------------------------------------- */

export type TocStyle = "default" | "chapter" | "pannasaka";

/** Projection of a structural node; always recomputable from the forest. */
export interface TocEntry {
  readonly nodeId: string;
  readonly displayTitle: string;
  readonly level: number;
  readonly depth: number;
  readonly style: TocStyle;
  readonly collapsed: boolean;
}

/** Depth cutoff for a projection; `all` keeps every structural node. */
export type TocDepth = number | "all";
