export * from "./types.js";
export * from "./measurement-set.js";
export * from "./input-resolver.js";
export * from "./density-estimator.js";
export * from "./classifier.js";
export * from "./session.js";
export * from "./formatting.js";
