export * from "./basic-parser.js";
export * from "./container.js";
export * from "./grammar.js";
export * from "./stateful-decoder.js";
export { TagClass, UniversalTag } from "../common/types.js";
export type { TLV, TLVHeader, TLVResult, TagInfo } from "../common/types.js";
