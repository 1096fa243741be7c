// heading-formats.ts
import type { OverrideConfig } from "./overrides.ts";
import type { StructuralDocumentNode } from "./model.ts";

export type OutputFormatName = "html" | "epub" | "pdf";

/**
 * What a renderer emits for one heading. For markup formats `element` is the
 * tag name (`h1`…`h6`); for PDF it is the LaTeX command or template name.
 */
export interface HeadingMarkup {
  readonly element: string;
  readonly classes: readonly string[];
}

export interface HeadingFormat {
  readonly name: OutputFormatName;
  /** Deepest addressable heading level; deeper nodes collapse onto it. */
  readonly maxHeadingLevel: number;
  markup(node: StructuralDocumentNode): HeadingMarkup;
}

const LATEX_COMMANDS = [
  "chapter*",
  "section*",
  "subsection*",
  "subsubsection*",
  "paragraph*",
  "subparagraph*",
] as const;

function roleClass(node: StructuralDocumentNode) {
  if (node.nature === "pannasaka") return "pannasaka";
  return node.role === "chapter" ? "chapter-title" : "section-title";
}

function markupFormat(
  name: "html" | "epub",
  maxHeadingLevel: number,
): HeadingFormat {
  return {
    name,
    maxHeadingLevel,
    markup: (node) => ({
      element: `h${Math.min(node.headingLevel + 1, 6)}`,
      classes: [
        "heading",
        roleClass(node),
        ...(node.collapsed ? ["collapsed"] : []),
      ],
    }),
  };
}

function pdfFormat(maxHeadingLevel: number): HeadingFormat {
  return {
    name: "pdf",
    maxHeadingLevel,
    markup: (node) => {
      const command = node.nature === "pannasaka"
        ? "pannasa"
        : node.role === "chapter"
        ? "chapter*"
        : LATEX_COMMANDS[Math.min(node.headingLevel, LATEX_COMMANDS.length - 1)];
      return {
        element: command,
        classes: node.collapsed ? ["collapsed"] : [],
      };
    },
  };
}

export const DEFAULT_MAX_HEADING_LEVELS: Readonly<
  Record<OutputFormatName, number>
> = { html: 6, epub: 6, pdf: 5 };

/**
 * Build a heading profile for an output format. `maxHeadingLevel` replaces the
 * format default, e.g. from the `headingLevels` override configuration.
 */
export function headingFormat(
  name: OutputFormatName,
  options?: { maxHeadingLevel?: number },
): HeadingFormat {
  const max = options?.maxHeadingLevel ?? DEFAULT_MAX_HEADING_LEVELS[name];
  if (!Number.isInteger(max) || max < 1) {
    throw new RangeError(`maxHeadingLevel must be a positive integer, got ${max}`);
  }
  switch (name) {
    case "html":
    case "epub":
      return markupFormat(name, max);
    case "pdf":
      return pdfFormat(max);
  }
}

export const headingFormats = {
  html: headingFormat("html"),
  epub: headingFormat("epub"),
  pdf: headingFormat("pdf"),
} as const;

/** Heading profile for a format with the configured level cap applied. */
export const configuredHeadingFormat = (
  name: OutputFormatName,
  levels: OverrideConfig["headingLevels"],
) => headingFormat(name, { maxHeadingLevel: levels[name] });
