/**
 * @module edition
 *
 * Runs the assembly pipeline for every volume of a publication. Each volume is
 * its own failure domain: a broken volume is recorded as a failure and its
 * siblings are still assembled. Lifecycle is published on an optional typed
 * event bus (see `verboseInfoEditionEventBus` for a console renderer).
 */
import { performance } from "node:perf_hooks";
import type { EventBus } from "../universal/event-bus.ts";
import { type AssembledVolume, assembleVolume } from "./assembler.ts";
import { type EditionError, isEditionError } from "./errors.ts";
import {
  configuredHeadingFormat,
  type HeadingFormat,
  type OutputFormatName,
} from "./heading-formats.ts";
import type { DepthConflict, VolumeInput } from "./model.ts";
import type { DepthOverrides } from "./overrides.ts";
import {
  type HeadingAnnotation,
  headings,
  type TocDepths,
  tocs,
  type VolumeTocs,
} from "./projector.ts";
import type { TreeIndex } from "./tree-index.ts";

export type EditionBusEvents = {
  "volume:start": {
    collectionId: string;
    volume: number;
    segments: number;
  };
  "volume:done": {
    collectionId: string;
    volume: number;
    branches: number;
    leaves: number;
    collapsed: number;
    durationMs: number;
  };
  "volume:error": {
    collectionId: string;
    volume: number;
    error: EditionError;
  };
  "depth:conflict": {
    collectionId: string;
    volume: number;
    conflict: DepthConflict;
  };
};

export interface EditionVolume extends AssembledVolume {
  readonly toc: VolumeTocs;
  readonly headings: readonly HeadingAnnotation[];
}

export interface VolumeFailure {
  readonly collectionId: string;
  readonly volume: number;
  readonly error: EditionError;
}

export interface EditionAssembly {
  readonly assembled: readonly EditionVolume[];
  readonly failures: readonly VolumeFailure[];
}

export const DEFAULT_TOC_DEPTHS: TocDepths = {
  mainDepth: "all",
  secondaryDepth: 1,
};

export interface AssembleEditionInit {
  readonly index: TreeIndex;
  readonly volumes: readonly VolumeInput[];
  readonly overrides: DepthOverrides;
  /** A format name takes its level cap from `overrides.headingLevels`. */
  readonly format: HeadingFormat | OutputFormatName;
  readonly toc?: TocDepths;
  readonly bus?: EventBus<EditionBusEvents>;
}

/**
 * Assemble every volume in order. Structural failures (`EditionError`) are
 * collected per volume; anything else is a defect and propagates. An error
 * thrown by a bus listener propagates as well.
 */
export function assembleEdition(init: AssembleEditionInit): EditionAssembly {
  const { index, overrides, bus } = init;
  const format = typeof init.format === "string"
    ? configuredHeadingFormat(init.format, overrides.headingLevels)
    : init.format;
  const tocDepths = init.toc ?? DEFAULT_TOC_DEPTHS;

  const emit = <K extends keyof EditionBusEvents>(
    type: K,
    detail: EditionBusEvents[K],
  ) => {
    if (!bus) return;
    bus.emit(type, detail);
  };

  const assembled: EditionVolume[] = [];
  const failures: VolumeFailure[] = [];

  for (const volume of init.volumes) {
    const { collectionId } = volume;
    emit("volume:start", {
      collectionId,
      volume: volume.volume,
      segments: volume.segments.length,
    });
    const started = performance.now();

    let built: EditionVolume;
    try {
      const result = assembleVolume({ index, volume, overrides, format });
      built = Object.freeze({
        ...result,
        toc: tocs(result.forest, tocDepths),
        headings: headings(result.forest, format),
      });
    } catch (error) {
      if (!isEditionError(error)) throw error;
      failures.push({ collectionId, volume: volume.volume, error });
      emit("volume:error", { collectionId, volume: volume.volume, error });
      continue;
    }

    // listeners run outside the failure domain; their errors reach the caller
    assembled.push(built);
    for (const conflict of built.conflicts) {
      emit("depth:conflict", { collectionId, volume: volume.volume, conflict });
    }
    emit("volume:done", {
      collectionId,
      volume: volume.volume,
      branches: built.stats.branches,
      leaves: built.stats.leaves,
      collapsed: built.stats.collapsed,
      durationMs: performance.now() - started,
    });
  }

  return { assembled, failures };
}
