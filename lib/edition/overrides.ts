/**
 * @module overrides
 *
 * Depth-override configuration. The published trees say how deep every
 * structural id sits; some collections still have to be rendered differently:
 *
 * - **forced chapters**: a collection (optionally only some of its volumes)
 *   renders chosen ids as top-level chapters regardless of tree depth. Without
 *   `ids`, the rule targets the collection's terminal branches, the groups whose
 *   children are all texts;
 * - **pannasaka**: ids ending with a suffix pattern, or listed explicitly, are
 *   fifty-sutta groupings with their own heading and TOC styling;
 * - **precedence**: which category wins when both match one id;
 * - **heading levels**: per-format caps replacing the format defaults.
 *
 * Configuration is validated with zod and compiled once. Anything that cannot
 * be parsed fails with `InvalidOverrideConfigError` at startup.
 */
import { readFile } from "node:fs/promises";
import JSON5 from "json5";
import { z } from "zod";
import { InvalidOverrideConfigError, zodIssueLines } from "./errors.ts";
import type { OverrideCategory } from "./model.ts";
import type { TreeIndex } from "./tree-index.ts";

export const DEFAULT_PANNASAKA_SUFFIX = "pannasaka";

export const DEFAULT_PRECEDENCE: readonly OverrideCategory[] = [
  "forced-chapter",
  "pannasaka",
];

export const forcedChapterRuleSchema = z.object({
  collection: z.string().min(1),
  volumes: z.union([
    z.literal("all"),
    z.array(z.number().int().positive()).min(1),
  ]).default("all"),
  ids: z.array(z.string().min(1)).min(1).optional(),
}).strict();

const headingLevelSchema = z.number().int().min(1).max(10);

export const overrideConfigSchema = z.object({
  forcedChapters: z.array(forcedChapterRuleSchema).default([]),
  pannasaka: z.object({
    suffixPattern: z.string().min(1).default(DEFAULT_PANNASAKA_SUFFIX),
    ids: z.array(z.string().min(1)).default([]),
  }).strict().default({ suffixPattern: DEFAULT_PANNASAKA_SUFFIX, ids: [] }),
  precedence: z.array(z.enum(["forced-chapter", "pannasaka"]))
    .length(2)
    .refine((p) => new Set(p).size === p.length, {
      message: "precedence must name each category once",
    })
    .default(["forced-chapter", "pannasaka"]),
  headingLevels: z.object({
    html: headingLevelSchema,
    epub: headingLevelSchema,
    pdf: headingLevelSchema,
  }).partial().strict().default({}),
}).strict();

export type OverrideConfigInput = z.input<typeof overrideConfigSchema>;
export type OverrideConfig = z.output<typeof overrideConfigSchema>;
export type ForcedChapterRule = z.output<typeof forcedChapterRuleSchema>;

/** Compiled, immutable form handed to depth resolvers. */
export interface DepthOverrides {
  readonly forcedChapters: readonly ForcedChapterRule[];
  readonly pannasakaSuffix: RegExp;
  readonly pannasakaIds: ReadonlySet<string>;
  readonly precedence: readonly OverrideCategory[];
  readonly headingLevels: OverrideConfig["headingLevels"];
}

function suffixRegExp(pattern: string): RegExp {
  try {
    return new RegExp(`(?:${pattern})$`);
  } catch (err) {
    throw new InvalidOverrideConfigError(
      `pannasaka suffix pattern "${pattern}" cannot be parsed: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }
}

/**
 * Validate and compile override configuration. When an index is given, every
 * forced-chapter rule must name a collection the index knows.
 */
export function compileOverrides(
  input: unknown = {},
  options?: { index?: TreeIndex },
): DepthOverrides {
  const parsed = overrideConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = zodIssueLines(parsed.error);
    throw new InvalidOverrideConfigError(
      `invalid override configuration: ${issues.join("; ")}`,
      issues,
    );
  }
  const config = parsed.data;

  const index = options?.index;
  if (index) {
    const unknown = config.forcedChapters
      .map((r) => r.collection)
      .filter((c) => !index.hasCollection(c));
    if (unknown.length) {
      throw new InvalidOverrideConfigError(
        `forced-chapter rules reference unknown collections: ${
          [...new Set(unknown)].join(", ")
        }`,
        unknown,
      );
    }
  }

  return Object.freeze({
    forcedChapters: Object.freeze(config.forcedChapters),
    pannasakaSuffix: suffixRegExp(config.pannasaka.suffixPattern),
    pannasakaIds: new Set(config.pannasaka.ids),
    precedence: Object.freeze(config.precedence),
    headingLevels: Object.freeze(config.headingLevels),
  });
}

/** Overrides with no forced chapters and the default pannasaka suffix. */
export const defaultOverrides = (): DepthOverrides => compileOverrides({});

type Env = Readonly<Record<string, string | undefined>>;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const envIdsSchema = z.array(z.string().min(1));

const envChapterTitlesSchema = z.record(
  z.string().min(1),
  z.union([z.literal("all"), z.array(z.number().int().positive()).min(1)]),
);

function parseEnvValue<T>(name: string, raw: string, schema: z.ZodType<T>): T {
  let value: unknown;
  try {
    value = JSON5.parse(raw);
  } catch (err) {
    throw new InvalidOverrideConfigError(
      `${name} cannot be parsed: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = zodIssueLines(parsed.error);
    throw new InvalidOverrideConfigError(
      `invalid ${name}: ${issues.join("; ")}`,
      issues,
    );
  }
  return parsed.data;
}

/** A bracketed list is read as JSON5; anything else as comma separated ids. */
function envIds(raw: string | undefined): string[] {
  const text = raw?.trim() ?? "";
  if (text.startsWith("[")) {
    return parseEnvValue("ADDITIONAL_PANNASAKA_IDS", text, envIdsSchema);
  }
  return text.split(",").map((s) => s.trim()).filter(Boolean);
}

export type EnvOverrides = Pick<
  OverrideConfigInput,
  "pannasaka" | "forcedChapters"
>;

/**
 * Read override settings from the environment:
 * - `ADDITIONAL_PANNASAKA_IDS`: ids added to the pannasaka allow-list, as a
 *   JSON5 array or a comma separated list
 * - `TEXTS_WITH_CHAPTER_SUTTA_TITLES`: JSON5 object mapping a collection to
 *   `"all"` or a list of volumes; each entry becomes a forced-chapter rule
 * - `EDITION_PANNASAKA_SUFFIX`: replaces the suffix pattern
 */
export function overridesFromEnv(env: Env = process.env): EnvOverrides {
  const ids = envIds(env.ADDITIONAL_PANNASAKA_IDS);
  const suffixPattern = env.EDITION_PANNASAKA_SUFFIX?.trim();
  const titles = env.TEXTS_WITH_CHAPTER_SUTTA_TITLES?.trim();
  const forcedChapters = titles
    ? Object.entries(
      parseEnvValue(
        "TEXTS_WITH_CHAPTER_SUTTA_TITLES",
        titles,
        envChapterTitlesSchema,
      ),
    ).map(([collection, volumes]) => ({ collection, volumes }))
    : [];

  return {
    ...(ids.length || suffixPattern
      ? {
        pannasaka: {
          ...(suffixPattern ? { suffixPattern } : null),
          ...(ids.length ? { ids } : null),
        },
      }
      : null),
    ...(forcedChapters.length ? { forcedChapters } : null),
  };
}

/**
 * Overlay environment settings on a configuration document. Env ids and
 * forced-chapter rules extend the file's; an env suffix replaces the file's.
 */
export function withEnvOverlay(config: unknown, env: Env = process.env): unknown {
  const overlay = overridesFromEnv(env);
  if (!isRecord(config)) return config;
  if (!overlay.pannasaka && !overlay.forcedChapters) return config;

  const out: Record<string, unknown> = { ...config };
  const pannasaka = overlay.pannasaka;
  if (pannasaka) {
    const base = isRecord(config.pannasaka) ? config.pannasaka : {};
    const baseIds: unknown[] = Array.isArray(base.ids) ? base.ids : [];
    out.pannasaka = {
      ...base,
      ...(pannasaka.suffixPattern
        ? { suffixPattern: pannasaka.suffixPattern }
        : null),
      ...(pannasaka.ids ? { ids: [...baseIds, ...pannasaka.ids] } : null),
    };
  }
  if (overlay.forcedChapters) {
    const baseRules: unknown[] = Array.isArray(config.forcedChapters)
      ? config.forcedChapters
      : [];
    out.forcedChapters = [...baseRules, ...overlay.forcedChapters];
  }
  return out;
}

/** Read a JSON/JSON5 override file, overlay the environment and compile it. */
export async function loadOverrides(
  path: string,
  options?: {
    index?: TreeIndex;
    env?: Env;
  },
): Promise<DepthOverrides> {
  const text = await readFile(path, "utf-8");
  let document: unknown;
  try {
    document = JSON5.parse(text);
  } catch (err) {
    throw new InvalidOverrideConfigError(
      `cannot parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return compileOverrides(withEnvOverlay(document, options?.env), {
    index: options?.index,
  });
}
