import { concatBytes } from "../common/codecs.js";
import {
  DecoderError,
  FramingError,
  GrammarError,
} from "../common/errors.js";
import { defaultLogger, type Logger } from "../common/logger.js";
import { describeTag, type TLV } from "../common/types.js";
import { BasicTLVParser } from "./basic-parser.js";
import { DecodeContainer } from "./container.js";
import type { Grammar } from "./grammar.js";

const EMPTY = new Uint8Array(0);

export interface DecoderOptions {
  /** Largest accepted top-level TLV, header included; 0 or absent means unlimited. */
  readonly maxPduSize?: number;
  /** Deepest accepted nesting of constructed values. Defaults to 100. */
  readonly maxDepth?: number;
  readonly logger?: Logger;
}

export type DecoderCallback<R> = (message: R) => void;

export type DecodeOutcome<R> =
  | { readonly status: "complete"; readonly message: R; readonly consumed: number }
  | { readonly status: "need-more-data" };

/**
 * Decodes a sequence of PDUs from one byte source, chunk by chunk.
 * Each completed top-level message is handed to the callback, in arrival order.
 */
export class StatefulDecoder<S extends string, T, R> {
  public readonly grammar: Grammar<S, T, R>;
  public readonly maxPduSize: number;
  public readonly maxDepth: number;
  private readonly logger: Logger;
  private container: DecodeContainer<S, T>;
  private pending: Uint8Array = EMPTY;
  private callback: DecoderCallback<R> | undefined;
  private failure: Error | undefined;

  public constructor(grammar: Grammar<S, T, R>, options?: DecoderOptions) {
    this.grammar = grammar;
    this.maxPduSize = options?.maxPduSize ?? 0;
    this.maxDepth = options?.maxDepth ?? 100;
    this.logger = options?.logger ?? defaultLogger;
    this.container = new DecodeContainer(grammar, this.logger);
  }

  /**
   * Decode a single PDU occupying the whole of `bytes`.
   */
  public static decodeOne<S extends string, T, R>(
    grammar: Grammar<S, T, R>,
    bytes: Uint8Array,
    options?: DecoderOptions,
  ): R {
    const decoder = new StatefulDecoder(grammar, options);
    const messages: R[] = [];
    decoder.setCallback((message) => messages.push(message));
    decoder.decode(bytes);
    decoder.flush();
    if (messages.length !== 1) {
      throw new DecoderError(
        `Expected one ${grammar.name} PDU, found ${messages.length}`,
      );
    }
    return messages[0];
  }

  /**
   * Decode the PDU at the start of `bytes`, or report that it is not complete yet.
   */
  public static decodeFrom<S extends string, T, R>(
    grammar: Grammar<S, T, R>,
    bytes: Uint8Array,
    options?: DecoderOptions,
  ): DecodeOutcome<R> {
    const header = BasicTLVParser.readHeader(bytes, 0);
    if (header === null || header.headerLength + header.length > bytes.length) {
      return { status: "need-more-data" };
    }
    const consumed = header.headerLength + header.length;
    const message = StatefulDecoder.decodeOne(
      grammar,
      bytes.subarray(0, consumed),
      options,
    );
    return { status: "complete", message, consumed };
  }

  public setCallback(callback: DecoderCallback<R>): void {
    this.callback = callback;
  }

  public getCallback(): DecoderCallback<R> | undefined {
    return this.callback;
  }

  /** Absolute stream position of the next byte to decode. */
  public get position(): number {
    return this.container.position;
  }

  /** Bytes received but not yet framed. */
  public get pendingBytes(): number {
    return this.pending.length;
  }

  public decode(chunk: Uint8Array): void {
    this.ensureUsable();
    const buffer =
      this.pending.length === 0 ? chunk : concatBytes(this.pending, chunk);
    let offset = 0;
    try {
      for (;;) {
        const consumed = this.readOne(buffer, offset);
        if (consumed === 0) break;
        offset += consumed;
      }
    } catch (e) {
      this.recordFailure(e);
      throw e;
    }
    // Copy: the tail must not alias the caller's chunk.
    this.pending = buffer.slice(offset);
  }

  /**
   * Declare the end of input. Fails if a PDU was left unfinished.
   */
  public flush(): void {
    this.ensureUsable();
    const container = this.container;
    try {
      if (this.pending.length > 0) {
        throw new FramingError(
          `Input ended inside a TLV with ${this.pending.length} byte(s) unread`,
          container.position,
        );
      }
      if (container.inProgress) {
        throw new GrammarError(
          "Input ended in a non-terminal state",
          container.context(),
        );
      }
    } catch (e) {
      this.recordFailure(e);
      throw e;
    }
  }

  public reset(): void {
    this.container = new DecodeContainer(this.grammar, this.logger);
    this.pending = EMPTY;
    this.failure = undefined;
  }

  /**
   * Frame and apply one TLV at `offset`.
   * @returns Bytes consumed; 0 when more input is needed.
   */
  private readOne(buffer: Uint8Array, offset: number): number {
    const container = this.container;
    const header = BasicTLVParser.readHeader(buffer, offset, container.position);
    if (header === null) return 0;

    const constructed = header.tagInfo.constructed;
    const valueOffset = container.position + header.headerLength;
    const valueEnd = valueOffset + header.length;
    const parent = container.peekFrame();
    if (parent !== undefined && valueEnd > parent.end) {
      throw new FramingError(
        `TLV ${describeTag(header.tag)} ends at ${valueEnd}, past its enclosing value ending at ${parent.end}`,
        container.position,
      );
    }
    if (
      parent === undefined &&
      this.maxPduSize > 0 &&
      valueEnd - container.position > this.maxPduSize
    ) {
      throw new FramingError(
        `PDU of ${valueEnd - container.position} bytes exceeds the ${this.maxPduSize} byte limit`,
        container.position,
      );
    }
    if (constructed && container.depth >= this.maxDepth) {
      throw new FramingError(
        `Maximum nesting depth exceeded: ${this.maxDepth}`,
        container.position,
      );
    }

    const size = constructed
      ? header.headerLength
      : header.headerLength + header.length;
    if (offset + size > buffer.length) return 0;

    const start = offset + header.headerLength;
    const tlv: TLV = {
      tag: header.tag,
      constructed,
      length: header.length,
      valueOffset,
      valueEnd,
      value: constructed ? EMPTY : buffer.subarray(start, start + header.length),
    };
    this.grammar.step(container, tlv);
    container.advance(size);
    if (constructed) {
      container.pushFrame({ state: container.state, tag: header.tag, end: valueEnd });
    }
    this.closeFrames();
    return size;
  }

  private closeFrames(): void {
    const container = this.container;
    let frame = container.peekFrame();
    while (frame !== undefined && frame.end === container.position) {
      container.popFrame();
      this.grammar.close(container, frame);
      frame = container.peekFrame();
    }
    if (container.depth === 0) {
      this.complete();
    }
  }

  private complete(): void {
    const container: DecodeContainer<S, T> = this.container;
    if (!container.grammarEndAllowed) {
      throw new GrammarError(
        "PDU ended in a non-terminal state",
        container.context(),
      );
    }
    let message: R;
    try {
      message = this.grammar.finish(container.value);
    } catch (e) {
      if (e instanceof DecoderError) throw e;
      container.fail(e instanceof Error ? e.message : String(e), e);
    }
    container.reset();

    if (this.callback === undefined) {
      this.logger.warn(
        { grammar: this.grammar.name },
        "decoded PDU dropped: no callback registered",
      );
      return;
    }
    this.callback(message);
  }

  private ensureUsable(): void {
    if (this.failure !== undefined) {
      throw new DecoderError(
        `Decoder for ${this.grammar.name} failed earlier; call reset() before reuse`,
        -1,
        { cause: this.failure },
      );
    }
  }

  private recordFailure(e: unknown): void {
    this.failure = e instanceof Error ? e : new Error(String(e));
    this.pending = EMPTY;
    this.logger.debug({ err: this.failure, grammar: this.grammar.name }, "decoding failed");
  }
}
