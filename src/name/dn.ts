import { TooComplexDnError } from "../common/errors.js";
import { FastDnParser } from "./fast-dn-parser.js";
import type { Rdn } from "./rdn.js";

export interface DnParseOptions {
  /**
   * Full DN parser used when the fast path gives up on the input.
   */
  readonly fallback?: (text: string) => Dn;
}

/**
 * Distinguished name, most specific RDN first. Keeps the exact input text:
 * `toString()` joins each RDN's raw text with the separator that followed it.
 */
export class Dn {
  public static readonly EMPTY = new Dn([], []);

  public readonly rdns: readonly Rdn[];
  private readonly separators: readonly string[];

  public constructor(rdns: readonly Rdn[], separators: readonly string[]) {
    if (separators.length !== Math.max(0, rdns.length - 1)) {
      throw new Error(
        `A DN of ${rdns.length} RDN(s) needs ${Math.max(0, rdns.length - 1)} separator(s); got ${separators.length}`,
      );
    }
    this.rdns = Object.freeze([...rdns]);
    this.separators = Object.freeze([...separators]);
  }

  /**
   * Parse `text`; blank input is the empty DN.
   */
  public static parse(text: string, options?: DnParseOptions): Dn {
    if (text.trim().length === 0) return Dn.EMPTY;
    try {
      return FastDnParser.parse(text);
    } catch (e) {
      if (e instanceof TooComplexDnError && options?.fallback !== undefined) {
        return options.fallback(text);
      }
      throw e;
    }
  }

  public get size(): number {
    return this.rdns.length;
  }

  public get isEmpty(): boolean {
    return this.rdns.length === 0;
  }

  public getRdn(index: number): Rdn {
    const rdn = this.rdns[index];
    if (rdn === undefined) {
      throw new RangeError(`No RDN at index ${index} in a DN of size ${this.size}`);
    }
    return rdn;
  }

  public get normalized(): string {
    return this.rdns.map((rdn) => rdn.normalized).join(",");
  }

  public equals(other: Dn): boolean {
    return this.normalized === other.normalized;
  }

  public toString(): string {
    let out = "";
    this.rdns.forEach((rdn, i) => {
      out += rdn.upName;
      if (i < this.separators.length) out += this.separators[i];
    });
    return out;
  }
}
