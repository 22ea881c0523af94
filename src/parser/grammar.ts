import { DecoderError, GrammarError } from "../common/errors.js";
import { describeTag, type TLV } from "../common/types.js";
import type {
  ConstructedFrame,
  DecodeContainer,
  GrammarSeed,
} from "./container.js";

export type GrammarAction<S extends string, T> = (
  container: DecodeContainer<S, T>,
) => void;

export interface GrammarTransition<S extends string, T> {
  readonly to: S;
  readonly action?: GrammarAction<S, T>;
  /**
   * Whether the message may end right after this transition.
   */
  readonly endAllowed?: boolean;
}

export interface TransitionSpec<S extends string, T>
  extends GrammarTransition<S, T> {
  readonly from: S;
  readonly tag: number;
}

// Runs when a constructed value opened in state `opened` reaches its end.
export interface CloserSpec<S extends string, T> extends GrammarTransition<S, T> {
  readonly opened: S;
}

export interface GrammarDefinition<S extends string, T, R> {
  readonly name: string;
  readonly initialState: S;
  readonly transitions: readonly TransitionSpec<S, T>[];
  readonly closers?: readonly CloserSpec<S, T>[];
  create(): T;
  /**
   * Turn the finished draft into the delivered message.
   */
  finish(draft: T): R;
}

/**
 * Immutable transition table for one message type.
 * @template S - State names.
 * @template T - The draft object built while decoding.
 * @template R - The message handed to the caller.
 */
export class Grammar<S extends string, T, R> implements GrammarSeed<S, T> {
  public readonly name: string;
  public readonly initialState: S;
  private readonly table: ReadonlyMap<S, ReadonlyMap<number, GrammarTransition<S, T>>>;
  private readonly closers: ReadonlyMap<S, GrammarTransition<S, T>>;
  private readonly definition: GrammarDefinition<S, T, R>;

  public constructor(definition: GrammarDefinition<S, T, R>) {
    this.definition = definition;
    this.name = definition.name;
    this.initialState = definition.initialState;

    const table = new Map<S, Map<number, GrammarTransition<S, T>>>();
    for (const spec of definition.transitions) {
      let row = table.get(spec.from);
      if (row === undefined) {
        row = new Map();
        table.set(spec.from, row);
      }
      if (row.has(spec.tag)) {
        throw new Error(
          `Grammar ${definition.name}: duplicate transition from ${spec.from} on ${describeTag(spec.tag)}`,
        );
      }
      row.set(spec.tag, {
        to: spec.to,
        action: spec.action,
        endAllowed: spec.endAllowed ?? false,
      });
    }
    this.table = table;

    const closers = new Map<S, GrammarTransition<S, T>>();
    for (const spec of definition.closers ?? []) {
      if (closers.has(spec.opened)) {
        throw new Error(
          `Grammar ${definition.name}: duplicate closer for ${spec.opened}`,
        );
      }
      closers.set(spec.opened, {
        to: spec.to,
        action: spec.action,
        endAllowed: spec.endAllowed ?? false,
      });
    }
    this.closers = closers;
  }

  public create(): T {
    return this.definition.create();
  }

  public finish(draft: T): R {
    return this.definition.finish(draft);
  }

  public getTransition(
    state: S,
    tag: number,
  ): GrammarTransition<S, T> | undefined {
    return this.table.get(state)?.get(tag);
  }

  /**
   * Apply the transition for the TLV just read.
   */
  public step(container: DecodeContainer<S, T>, tlv: TLV): void {
    container.setCurrentTlv(tlv);
    const from = container.state;
    const transition = this.getTransition(from, tlv.tag);
    if (transition === undefined) {
      throw new GrammarError("Unexpected tag", container.context());
    }

    if (container.logger.isLevelEnabled("debug")) {
      container.logger.debug(
        { grammar: this.name, from, to: transition.to, tag: describeTag(tlv.tag) },
        "transition",
      );
    }
    container.transition(transition.to);
    container.setGrammarEndAllowed(transition.endAllowed ?? false);
    this.run(container, transition);
  }

  /**
   * Leave the constructed value described by `frame`.
   */
  public close(
    container: DecodeContainer<S, T>,
    frame: ConstructedFrame<S>,
  ): void {
    if (!container.grammarEndAllowed) {
      throw new GrammarError(
        `Constructed value ${describeTag(frame.tag)} ended early`,
        { ...container.context(), tag: frame.tag, position: frame.end },
      );
    }
    const closer = this.closers.get(frame.state);
    if (closer === undefined) return;

    container.transition(closer.to);
    container.setGrammarEndAllowed(closer.endAllowed ?? false);
    this.run(container, closer);
  }

  private run(
    container: DecodeContainer<S, T>,
    transition: GrammarTransition<S, T>,
  ): void {
    if (transition.action === undefined) return;
    try {
      transition.action(container);
    } catch (e) {
      if (e instanceof DecoderError) throw e;
      container.fail(e instanceof Error ? e.message : String(e), e);
    }
  }
}
