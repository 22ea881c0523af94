import { ActionError, type GrammarContext } from "../common/errors.js";
import type { Logger } from "../common/logger.js";
import type { TLV } from "../common/types.js";

/**
 * What a container needs to know about the grammar driving it.
 */
export interface GrammarSeed<S extends string, T> {
  readonly name: string;
  readonly initialState: S;
  create(): T;
}

/**
 * An open constructed value: the state entered with it and where it ends.
 */
export interface ConstructedFrame<S extends string> {
  readonly state: S;
  readonly tag: number;
  readonly end: number;
}

/**
 * Mutable state of one decode: the object under construction, the current
 * grammar state and the stack of open constructed values.
 */
export class DecodeContainer<S extends string, T> {
  public readonly logger: Logger;
  private readonly seed: GrammarSeed<S, T>;
  private currentState: S;
  private current: T;
  private tlv: TLV | undefined;
  private readonly frames: ConstructedFrame<S>[] = [];
  private endAllowed = false;
  private streamPosition = 0;
  private messageStart = 0;

  public constructor(seed: GrammarSeed<S, T>, logger: Logger) {
    this.seed = seed;
    this.logger = logger;
    this.currentState = seed.initialState;
    this.current = seed.create();
  }

  public get grammarName(): string {
    return this.seed.name;
  }

  public get state(): S {
    return this.currentState;
  }

  public transition(state: S): void {
    this.currentState = state;
  }

  public get value(): T {
    return this.current;
  }

  public get currentTlv(): TLV {
    if (this.tlv === undefined) {
      throw new Error(`No TLV read yet in grammar ${this.seed.name}`);
    }
    return this.tlv;
  }

  public setCurrentTlv(tlv: TLV): void {
    this.tlv = tlv;
  }

  public get grammarEndAllowed(): boolean {
    return this.endAllowed;
  }

  public setGrammarEndAllowed(allowed: boolean): void {
    this.endAllowed = allowed;
  }

  /** Absolute stream position of the next unread byte. */
  public get position(): number {
    return this.streamPosition;
  }

  public advance(count: number): void {
    this.streamPosition += count;
  }

  /** True once any byte of the current message has been consumed. */
  public get inProgress(): boolean {
    return this.streamPosition > this.messageStart;
  }

  public get depth(): number {
    return this.frames.length;
  }

  public pushFrame(frame: ConstructedFrame<S>): void {
    this.frames.push(frame);
  }

  public peekFrame(): ConstructedFrame<S> | undefined {
    return this.frames[this.frames.length - 1];
  }

  public popFrame(): ConstructedFrame<S> | undefined {
    return this.frames.pop();
  }

  public context(): GrammarContext {
    return {
      grammar: this.seed.name,
      state: this.currentState,
      tag: this.tlv?.tag,
      position: this.tlv?.valueOffset ?? this.streamPosition,
    };
  }

  /**
   * Reject the current TLV's value.
   */
  public fail(reason: string, cause?: unknown): never {
    throw new ActionError(reason, this.context(), cause);
  }

  /**
   * Start over for the next message; the stream position is kept.
   */
  public reset(): void {
    this.currentState = this.seed.initialState;
    this.current = this.seed.create();
    this.tlv = undefined;
    this.frames.length = 0;
    this.endAllowed = false;
    this.messageStart = this.streamPosition;
  }
}
