export * from "./types/gauge.js";
export * from "./types/fetch.js";
export * from "./types/snapshot.js";
