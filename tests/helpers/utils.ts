import { fromHex } from "../../src/common/codecs.js";
import { createLogger } from "../../src/common/logger.js";
import type { StatefulDecoder } from "../../src/parser/stateful-decoder.js";

export const silentLogger = createLogger({ level: "silent" });

/** Bytes from hex fragments; whitespace is ignored. */
export function hex(...parts: string[]): Uint8Array {
  return fromHex(parts.join(""));
}

/**
 * Register a callback that stores every delivered message.
 */
export function collect<S extends string, T, R>(decoder: StatefulDecoder<S, T, R>): R[] {
  const messages: R[] = [];
  decoder.setCallback((message) => messages.push(message));
  return messages;
}

/** Feed `bytes` to the decoder in slices cut at `cuts`. */
export function feed<S extends string, T, R>(
  decoder: StatefulDecoder<S, T, R>,
  bytes: Uint8Array,
  ...cuts: number[]
): void {
  let start = 0;
  for (const cut of [...cuts, bytes.length]) {
    decoder.decode(bytes.subarray(start, cut));
    start = cut;
  }
}
