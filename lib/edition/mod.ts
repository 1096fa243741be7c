export * from "./errors.ts";
export * from "./model.ts";
export * from "./tree-index.ts";
export * from "./segment-stream.ts";
export * from "./overrides.ts";
export * from "./heading-formats.ts";
export * from "./depth-resolver.ts";
export * from "./assembler.ts";
export * from "./projector.ts";
export * from "./toc-render.ts";
export * from "./edition.ts";
export * from "./verbose.ts";
export { type EventBus, eventBus } from "../universal/event-bus.ts";
