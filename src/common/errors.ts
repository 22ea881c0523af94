import { describeTag } from "./types.js";

/**
 * Base class of every failure raised while turning bytes into messages.
 */
export class DecoderError extends Error {
  constructor(
    message: string,
    public readonly position: number = -1,
    options?: { cause?: unknown },
  ) {
    super(position >= 0 ? `${message} at byte ${position}` : message, options);
    this.name = "DecoderError";
  }
}

/** Malformed identifier or length octets, or a TLV that does not fit its parent. */
export class FramingError extends DecoderError {
  constructor(reason: string, position: number = -1) {
    super(reason, position);
    this.name = "FramingError";
  }
}

export interface GrammarContext {
  readonly grammar: string;
  readonly state: string;
  readonly tag?: number;
  readonly position: number;
}

function contextSuffix(context: GrammarContext): string {
  const tag = context.tag === undefined ? "" : `, tag ${describeTag(context.tag)}`;
  return ` [grammar ${context.grammar}, state ${context.state}${tag}]`;
}

/** No transition for the tag in the current state, or input ended in a non-terminal state. */
export class GrammarError extends DecoderError {
  public readonly grammar: string;
  public readonly state: string;
  public readonly tag: number | undefined;

  constructor(reason: string, context: GrammarContext) {
    super(reason + contextSuffix(context), context.position);
    this.name = "GrammarError";
    this.grammar = context.grammar;
    this.state = context.state;
    this.tag = context.tag;
  }
}

/** A grammar action rejected the value of the current TLV. */
export class ActionError extends DecoderError {
  public readonly grammar: string;
  public readonly state: string;
  public readonly tag: number | undefined;

  constructor(reason: string, context: GrammarContext, cause?: unknown) {
    super(reason + contextSuffix(context), context.position, { cause });
    this.name = "ActionError";
    this.grammar = context.grammar;
    this.state = context.state;
    this.tag = context.tag;
  }
}

export class EncoderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EncoderError";
  }
}

export class OidSyntaxError extends Error {
  constructor(
    reason: string,
    public readonly input: string,
  ) {
    super(`Invalid OID '${input}': ${reason}`);
    this.name = "OidSyntaxError";
  }
}

export class DnSyntaxError extends Error {
  constructor(
    reason: string,
    public readonly input: string,
    public readonly position: number,
  ) {
    super(`Invalid DN '${input}': ${reason} at position ${position}`);
    this.name = "DnSyntaxError";
  }
}

/**
 * Not a rejection: the fast DN parser met a construct it does not handle and the
 * caller has to retry with a full parser.
 */
export class TooComplexDnError extends Error {
  constructor(
    public readonly input: string,
    public readonly position: number,
  ) {
    super(`DN '${input}' needs the full parser (position ${position})`);
    this.name = "TooComplexDnError";
  }
}
