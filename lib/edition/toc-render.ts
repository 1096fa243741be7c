// toc-render.ts
import type { TocEntry } from "./model.ts";

/** A TOC entry with the entries nested beneath it. */
export interface TocTreeItem {
  readonly entry: TocEntry;
  readonly children: readonly TocTreeItem[];
}

/**
 * Rebuild nesting from a flat, document-ordered list of entries. Works on any
 * projection, including one that skipped intermediate depths.
 */
export function nestToc(entries: Iterable<TocEntry>): TocTreeItem[] {
  type Mutable = { entry: TocEntry; children: Mutable[] };
  const roots: Mutable[] = [];
  const stack: Mutable[] = [];
  for (const entry of entries) {
    while (stack.length && (stack.at(-1)?.entry.depth ?? 0) >= entry.depth) {
      stack.pop();
    }
    const item: Mutable = { entry, children: [] };
    (stack.at(-1)?.children ?? roots).push(item);
    stack.push(item);
  }
  return roots;
}

const escapeHtml = (text: string) =>
  text.replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

const STYLE_CLASSES = {
  default: "",
  chapter: "toc-chapter",
  pannasaka: "toc-pannasaka",
} as const;

/**
 * Nested `<ul>` list for an HTML contents page. `href` maps an entry to its
 * link target and defaults to an in-page anchor.
 */
export function tocHtml(
  entries: Iterable<TocEntry>,
  options?: { href?: (entry: TocEntry) => string },
): string {
  const href = options?.href ?? ((e: TocEntry) => `#${e.nodeId}`);
  const list = (items: readonly TocTreeItem[]): string =>
    items.length
      ? `<ul>${items.map(listItem).join("")}</ul>`
      : "";
  const listItem = ({ entry, children }: TocTreeItem) => {
    const classes = [
      STYLE_CLASSES[entry.style],
      entry.collapsed ? "toc-collapsed" : "",
    ].filter(Boolean);
    const attr = classes.length ? ` class="${classes.join(" ")}"` : "";
    return `<li${attr}><a href="${escapeHtml(href(entry))}">${
      escapeHtml(entry.displayTitle)
    }</a>${list(children)}</li>`;
  };
  return list(nestToc(entries));
}

/** EPUB navigation point, as written to the package's nav document. */
export interface NavPoint {
  readonly id: string;
  readonly title: string;
  readonly href: string;
  readonly children: readonly NavPoint[];
}

/**
 * EPUB navigation tree. `fileOf` names the content document that holds an
 * entry; entries in the same file link by fragment.
 */
export function tocNav(
  entries: Iterable<TocEntry>,
  fileOf: (entry: TocEntry) => string,
): NavPoint[] {
  const toNav = ({ entry, children }: TocTreeItem): NavPoint => ({
    id: entry.nodeId,
    title: entry.displayTitle,
    href: `${fileOf(entry)}#${entry.nodeId}`,
    children: children.map(toNav),
  });
  return nestToc(entries).map(toNav);
}

/** Plain-text outline, handy in logs and test failures. */
export function tocAsciiText(
  entries: Iterable<TocEntry>,
  opts: { showIds?: boolean } = {},
): string {
  const showIds = opts.showIds ?? false;
  const lines: string[] = [];
  const render = (item: TocTreeItem, prefix: string, isLast: boolean) => {
    const branch = isLast ? "└── " : "├── ";
    const label = showIds
      ? `${item.entry.displayTitle} [${item.entry.nodeId}]`
      : item.entry.displayTitle;
    const marker = item.entry.style === "default" ? "" : ` (${item.entry.style})`;
    lines.push(`${prefix}${branch}${label}${marker}`);
    const nextPrefix = prefix + (isLast ? "    " : "│   ");
    item.children.forEach((child, i, arr) =>
      render(child, nextPrefix, i === arr.length - 1)
    );
  };
  const roots = nestToc(entries);
  roots.forEach((r, i) => render(r, "", i === roots.length - 1));
  return lines.join("\n");
}
