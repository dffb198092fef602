export * from "./sites.js";
export * from "./schemas.js";
