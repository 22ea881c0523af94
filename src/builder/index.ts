export * from "./basic-builder.js";
export * from "./byte-writer.js";
export { TagClass, UniversalTag } from "../common/types.js";
