export * from "./codecs.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./oid.js";
export * from "./types.js";
