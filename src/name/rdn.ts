import type { Ava } from "./ava.js";

/**
 * Relative distinguished name: one or more AVAs plus the raw text they came from.
 */
export class Rdn {
  public readonly avas: readonly Ava[];
  public readonly upName: string;

  public constructor(avas: readonly Ava[], upName: string) {
    if (avas.length === 0) {
      throw new Error("An RDN needs at least one attribute value assertion");
    }
    this.avas = Object.freeze([...avas]);
    this.upName = upName;
  }

  public get size(): number {
    return this.avas.length;
  }

  public get type(): string {
    return this.avas[0].normalizedType;
  }

  public get value(): string {
    return this.avas[0].normalizedValue;
  }

  public get normalized(): string {
    return this.avas.map((ava) => ava.normalized).join("+");
  }

  public equals(other: Rdn): boolean {
    return this.normalized === other.normalized;
  }

  public toString(): string {
    return this.upName;
  }
}
