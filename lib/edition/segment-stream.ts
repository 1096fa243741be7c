/**
 * @module segment-stream
 *
 * Turns delivered content into the ordered {@link Segment} stream a volume is
 * assembled from. Two inputs are understood:
 *
 * - a **stream document**: `[{ id, kind: "branch" | "leaf", title?, html_content? }]`;
 * - **API nodes**, as the publication API returns them per volume, where leaves
 *   carry per-segment markup templates and text that still have to be merged.
 */
import { z } from "zod";
import { MalformedSegmentError, zodIssueLines } from "./errors.ts";
import type { Segment } from "./model.ts";

/* -------------------------------------------------------------------------- */
/* Stream documents                                                            */
/* -------------------------------------------------------------------------- */

export const streamSegmentSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(["branch", "leaf"]),
  title: z.string().optional(),
  html_content: z.string().optional(),
});

export const streamDocumentSchema = z.array(streamSegmentSchema);

export type StreamSegment = z.infer<typeof streamSegmentSchema>;

function toSegment(raw: StreamSegment, index: number): Segment {
  if (raw.kind === "branch") {
    if (raw.title === undefined) {
      throw new MalformedSegmentError(
        `branch segment "${raw.id}" has no title`,
        index,
      );
    }
    return { kind: "branch", id: raw.id, title: raw.title };
  }
  if (raw.html_content === undefined) {
    throw new MalformedSegmentError(
      `leaf segment "${raw.id}" has no html_content`,
      index,
    );
  }
  return { kind: "leaf", id: raw.id, html: raw.html_content };
}

/** Validate a stream document and return its segments in order. */
export function segmentStream(input: unknown): Segment[] {
  const parsed = streamDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = zodIssueLines(parsed.error);
    const first = parsed.error.issues[0]?.path[0];
    throw new MalformedSegmentError(
      `invalid segment stream: ${issues.join("; ")}`,
      typeof first === "number" ? first : undefined,
      issues,
    );
  }
  return parsed.data.map(toSegment);
}

/* -------------------------------------------------------------------------- */
/* Leaf lines                                                                  */
/* -------------------------------------------------------------------------- */

const BLOCK_TAG = /<(p|ul|ol|dl)(?=[\s>])/g;

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Anchors for a comma separated reference list such as `"bj7.1, pts1.2"`.
 * Only reference types in `accepted` are kept.
 */
export function referenceAnchors(
  references: string,
  accepted: readonly string[],
): string {
  const anchors: string[] = [];
  for (const ref of references.split(",").map((r) => r.trim())) {
    for (const type of accepted) {
      const match = new RegExp(`^(${escapeRegExp(type)})(\\d+\\.?\\d*)`, "i")
        .exec(ref);
      if (!match) continue;
      const [, refType, refId] = match;
      anchors.push(
        `<a class='${refType}' id='${refType}${refId}'>${refType.toUpperCase()} ${refId}</a>`,
      );
      break;
    }
  }
  return anchors.join("");
}

/** Link from a line to its note in the notes section. */
export const noteRefAnchor = (n: number) =>
  `<a href='#note-${n}' id='noteref-${n}' role='doc-noteref' epub:type='noteref'>${n}</a>`;

export interface SegmentLineOptions {
  readonly references?: string;
  readonly acceptedReferences?: readonly string[];
  /** When set, the line carries a reference to note number `noteNumber`. */
  readonly noteNumber?: number;
}

/**
 * Render one line of a text: tag block elements with the segment id and put
 * the text (after any reference anchors, before any note reference) into the
 * template's `{}` slot.
 */
export function renderSegmentLine(
  markup: string,
  segmentId: string,
  text: string,
  options?: SegmentLineOptions,
): string {
  const tagged = markup.replace(BLOCK_TAG, `<$1 data-ref='${segmentId}'`);
  const anchors = options?.references && options.acceptedReferences?.length
    ? referenceAnchors(options.references, options.acceptedReferences)
    : "";
  const noteRef = options?.noteNumber === undefined
    ? ""
    : noteRefAnchor(options.noteNumber);
  return tagged.replace("{}", () => `${anchors}${text}${noteRef}`);
}

/* -------------------------------------------------------------------------- */
/* API nodes                                                                   */
/* -------------------------------------------------------------------------- */

const segmentMapSchema = z.record(z.string(), z.string()).nullish();

export const apiNodeSchema = z.object({
  uid: z.string().min(1),
  type: z.enum(["branch", "leaf"]),
  name: z.string().nullish(),
  acronym: z.string().nullish(),
  root_name: z.string().nullish(),
  mainmatter: z.object({
    markup: segmentMapSchema,
    main_text: segmentMapSchema,
    reference: segmentMapSchema,
    note: segmentMapSchema,
  }).partial().nullish(),
});

export type ApiNode = z.infer<typeof apiNodeSchema>;

/**
 * Adapt API nodes to segments. Branches are titled by `name`, then `acronym`,
 * then their uid. A leaf becomes one segment whose HTML joins its rendered
 * lines in markup order; leaves without markup are skipped. Lines with a
 * non-empty note get note references numbered from 1 across the whole call.
 */
export function segmentsFromApiNodes(
  nodes: unknown,
  options?: { acceptedReferences?: readonly string[] },
): Segment[] {
  const parsed = z.array(apiNodeSchema).safeParse(nodes);
  if (!parsed.success) {
    const issues = zodIssueLines(parsed.error);
    const first = parsed.error.issues[0]?.path[0];
    throw new MalformedSegmentError(
      `invalid API nodes: ${issues.join("; ")}`,
      typeof first === "number" ? first : undefined,
      issues,
    );
  }

  const segments: Segment[] = [];
  let notes = 0;
  for (const node of parsed.data) {
    if (node.type === "branch") {
      segments.push({
        kind: "branch",
        id: node.uid,
        title: node.name || node.acronym || node.uid,
      });
      continue;
    }
    const markup = node.mainmatter?.markup;
    if (!markup || !Object.keys(markup).length) continue;
    const text = node.mainmatter?.main_text ?? {};
    const refs = node.mainmatter?.reference ?? {};
    const lineNotes = node.mainmatter?.note ?? {};
    const html = Object.entries(markup)
      .map(([segmentId, template]) =>
        renderSegmentLine(template, segmentId, text[segmentId] ?? "", {
          references: refs[segmentId],
          acceptedReferences: options?.acceptedReferences,
          ...(lineNotes[segmentId] ? { noteNumber: ++notes } : null),
        })
      )
      .join("");
    segments.push({ kind: "leaf", id: node.uid, html });
  }
  return segments;
}
