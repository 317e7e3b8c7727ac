// @triage/worker — the triage pipeline: prefilter, queue and checkpoint
// stores, batch classifier, notifier, content source, and the run orchestrator
export * from "./atomic-file.js";
export * from "./prefilter.js";
export * from "./queue-store.js";
export * from "./checkpoint-store.js";
export * from "./prompt.js";
export * from "./batch-classifier.js";
export * from "./notifier.js";
export * from "./sources/reddit.js";
export * from "./orchestrator.js";
export * from "./deps.js";
export type { FetchLike } from "./fetch.js";
