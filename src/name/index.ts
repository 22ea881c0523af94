export * from "./ava.js";
export * from "./rdn.js";
export * from "./dn.js";
export * from "./fast-dn-parser.js";
