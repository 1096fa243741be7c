// errors.ts
import type { z } from "zod";

export type EditionErrorCode =
  | "UNKNOWN_NODE"
  | "MALFORMED_TREE"
  | "INVALID_OVERRIDE_CONFIG"
  | "MALFORMED_SEGMENT";

/** Base for every structural failure raised while assembling an edition. */
export abstract class EditionError extends Error {
  abstract readonly code: EditionErrorCode;
}

/**
 * A branch id (or one of its ancestors) is missing from both the super-tree and
 * the collection tree. Fatal for the volume being assembled, never for siblings.
 */
export class UnknownNodeError extends EditionError {
  readonly code = "UNKNOWN_NODE" as const;

  constructor(
    readonly nodeId: string,
    readonly collectionId: string,
    readonly volume?: number,
  ) {
    super(
      `Unknown node "${nodeId}" in collection "${collectionId}"` +
        (volume === undefined ? "" : ` (volume ${volume})`),
    );
    this.name = "UnknownNodeError";
  }

  /** Same failure, annotated with the volume it aborted. */
  inVolume(volume: number) {
    return new UnknownNodeError(this.nodeId, this.collectionId, volume);
  }
}

export class MalformedTreeError extends EditionError {
  readonly code = "MALFORMED_TREE" as const;

  constructor(
    message: string,
    readonly treeId: string,
    readonly issues: readonly string[] = [],
  ) {
    super(`Malformed tree "${treeId}": ${message}`);
    this.name = "MalformedTreeError";
  }
}

export class InvalidOverrideConfigError extends EditionError {
  readonly code = "INVALID_OVERRIDE_CONFIG" as const;

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(message);
    this.name = "InvalidOverrideConfigError";
  }
}

export class MalformedSegmentError extends EditionError {
  readonly code = "MALFORMED_SEGMENT" as const;

  constructor(
    message: string,
    readonly segmentIndex: number | undefined,
    readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "MalformedSegmentError";
  }
}

export const isEditionError = (e: unknown): e is EditionError =>
  e instanceof EditionError;

/** Flatten zod issues into `path: message` lines. */
export function zodIssueLines(error: z.ZodError): string[] {
  return error.issues.map((i) =>
    i.path.length ? `${i.path.map(String).join(".")}: ${i.message}` : i.message
  );
}
