import { OidSyntaxError } from "./errors.js";

const MAX_ARC = Number.MAX_SAFE_INTEGER;
// Under arc 2 the first sub-identifier is 80 + the second arc.
const MAX_SECOND_ARC_UNDER_2 = MAX_ARC - 80;

function base128Length(value: number): number {
  if (value < 128) return 1;
  if (value < 16384) return 2;
  if (value < 2097152) return 3;
  if (value < 268435456) return 4;
  let n = 5;
  let rest = Math.floor(value / 34359738368);
  while (rest > 0) {
    n++;
    rest = Math.floor(rest / 128);
  }
  return n;
}

function writeBase128(out: Uint8Array, pos: number, value: number): number {
  const len = base128Length(value);
  let rest = value;
  for (let i = len - 1; i >= 0; i--) {
    const group = rest % 128;
    out[pos + i] = i === len - 1 ? group : group | 0x80;
    rest = Math.floor(rest / 128);
  }
  return pos + len;
}

/**
 * Reason the dotted form is rejected, or undefined when it is a valid OID.
 */
function checkDotted(text: string): string | undefined {
  if (text.length === 0) return "empty input";
  const first = text.charCodeAt(0);
  if (first < 0x30 || first > 0x32) return "first arc must be 0, 1 or 2";
  if (text.length < 2 || text[1] !== ".") return "first arc must be followed by '.'";

  // 0 and 1 restrict the second arc to 0..39
  let limitSecond = first !== 0x32;
  let limit = first === 0x32 ? MAX_SECOND_ARC_UNDER_2 : MAX_ARC;
  let dotSeen = true;
  let value = 0;
  for (let i = 2; i < text.length; i++) {
    const c = text.charCodeAt(i);
    if (c === 0x2e) {
      if (dotSeen) return `empty arc at index ${i}`;
      if (limitSecond && value > 39) return "second arc must be <= 39";
      limitSecond = false;
      limit = MAX_ARC;
      dotSeen = true;
      value = 0;
    } else if (c >= 0x30 && c <= 0x39) {
      dotSeen = false;
      value = value * 10 + (c - 0x30);
      if (value > limit) return `arc exceeds ${limit}`;
    } else {
      return `unexpected character '${text[i]}' at index ${i}`;
    }
  }
  if (dotSeen) return "trailing '.'";
  if (limitSecond && value > 39) return "second arc must be <= 39";
  return undefined;
}

/**
 * Object identifier held as its arcs. Instances are immutable.
 */
export class Oid {
  public readonly arcs: readonly number[];
  private readonly hash: number;

  private constructor(arcs: number[]) {
    this.arcs = Object.freeze(arcs);
    this.hash = Oid.computeHash(arcs);
  }

  public static isValid(text: string | null | undefined): boolean {
    if (text === null || text === undefined) return false;
    return checkDotted(text) === undefined;
  }

  public static fromString(text: string): Oid {
    const problem = checkDotted(text);
    if (problem !== undefined) {
      throw new OidSyntaxError(problem, text);
    }
    return new Oid(text.split(".").map((arc) => Number(arc)));
  }

  public static fromArcs(arcs: readonly number[]): Oid {
    const text = arcs.join(".");
    if (arcs.some((arc) => !Number.isSafeInteger(arc) || arc < 0)) {
      throw new OidSyntaxError("arcs must be non-negative safe integers", text);
    }
    return Oid.fromString(text);
  }

  /**
   * Decode the content octets of an OBJECT IDENTIFIER.
   */
  public static fromBytes(bytes: Uint8Array): Oid {
    const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
    if (bytes.length === 0) {
      throw new OidSyntaxError("no content octets", hex);
    }
    if (bytes[bytes.length - 1] & 0x80) {
      throw new OidSyntaxError("last sub-identifier is truncated", hex);
    }

    const values: number[] = [];
    let value = 0;
    let start = true;
    for (const b of bytes) {
      if (start && b === 0x80) {
        throw new OidSyntaxError("sub-identifier padded with 0x80", hex);
      }
      value = value * 128 + (b & 0x7f);
      if (value > MAX_ARC) {
        throw new OidSyntaxError(`arc exceeds ${MAX_ARC}`, hex);
      }
      start = (b & 0x80) === 0;
      if (start) {
        values.push(value);
        value = 0;
      }
    }

    const first = values[0];
    let arcs: number[];
    if (first < 40) {
      arcs = [0, first];
    } else if (first < 80) {
      arcs = [1, first - 40];
    } else {
      arcs = [2, first - 80];
    }
    return new Oid(arcs.concat(values.slice(1)));
  }

  /**
   * Number of content octets produced by {@link toBytes}.
   */
  public get encodedLength(): number {
    let n = base128Length(this.arcs[0] * 40 + this.arcs[1]);
    for (let i = 2; i < this.arcs.length; i++) n += base128Length(this.arcs[i]);
    return n;
  }

  public toBytes(): Uint8Array {
    const out = new Uint8Array(this.encodedLength);
    let pos = writeBase128(out, 0, this.arcs[0] * 40 + this.arcs[1]);
    for (let i = 2; i < this.arcs.length; i++) {
      pos = writeBase128(out, pos, this.arcs[i]);
    }
    return out;
  }

  public toString(): string {
    return this.arcs.join(".");
  }

  public hashCode(): number {
    return this.hash;
  }

  public equals(other: Oid): boolean {
    if (this === other) return true;
    if (other.hash !== this.hash || other.arcs.length !== this.arcs.length) {
      return false;
    }
    return this.arcs.every((arc, i) => arc === other.arcs[i]);
  }

  // Arc-wise; a prefix sorts first.
  public compareTo(other: Oid): number {
    const len = Math.min(this.arcs.length, other.arcs.length);
    for (let i = 0; i < len; i++) {
      if (this.arcs[i] !== other.arcs[i]) {
        return this.arcs[i] < other.arcs[i] ? -1 : 1;
      }
    }
    return this.arcs.length - other.arcs.length;
  }

  private static computeHash(arcs: readonly number[]): number {
    let h = 37;
    for (const arc of arcs) {
      h = (Math.imul(h, 17) + Math.floor(arc / 0x100000000)) | 0;
      h = (Math.imul(h, 17) + (arc >>> 0)) | 0;
    }
    return h;
  }
}
