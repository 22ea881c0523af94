export * from "./control.js";
export * from "./messages.js";
export * from "./message-grammar.js";
export * from "./message-encoder.js";
export * from "./controls/sort-request.js";
export * from "./controls/sync-info-value.js";
