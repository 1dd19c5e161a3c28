export * from "./aggregates/monthCounts.js";
export * from "./aggregates/pathTree.js";
export * from "./aggregates/projectCounts.js";
export * from "./assignIntents.js";
export * from "./calendar.js";
export * from "./config.js";
export * from "./coverage/coverageCache.js";
export * from "./coverage/scanner.js";
export * from "./dayIndex.js";
export * from "./enrichment.js";
export * from "./debounce.js";
export * from "./errors.js";
export * from "./filter/compute.js";
export * from "./filter/filterEngine.js";
export * from "./filter/snapshot.js";
export * from "./hints.js";
export * from "./logger.js";
export * from "./overlays.js";
export * from "./providerPool.js";
export * from "./projects.js";
export * from "./providers/fileProvider.js";
export * from "./providers/index.js";
export * from "./providers/summarizer.js";
export * from "./providers/types.js";
export * from "./recordCache.js";
export * from "./reconciler.js";
export * from "./records.js";
export * from "./refreshScheduler.js";
export * from "./sessionIndex.js";
export * from "./snapshot.js";
export * from "./sourceProfiles.js";
export * from "./utils.js";
export * from "./watcher.js";
