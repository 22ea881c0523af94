import { DnSyntaxError, TooComplexDnError } from "../common/errors.js";
import { Oid } from "../common/oid.js";
import { Ava } from "./ava.js";
import { Dn } from "./dn.js";
import { Rdn } from "./rdn.js";

interface Cursor {
  readonly text: string;
  index: number;
}

const NUMERIC_OID = /^(0|[1-9][0-9]*)(\.(0|[1-9][0-9]*))+$/;

function isAlpha(c: string): boolean {
  return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");
}

function isDigit(c: string): boolean {
  return c >= "0" && c <= "9";
}

function isKeyChar(c: string): boolean {
  return isAlpha(c) || isDigit(c) || c === "-" || c === "_";
}

/**
 * Single-pass parser for the common shape of DNs: one AVA per RDN, descriptor
 * or numeric OID types, and values without escapes, quotes or hex strings.
 * Anything else raises {@link TooComplexDnError} so the caller can fall back
 * to a full parser.
 */
export class FastDnParser {
  public static parse(text: string): Dn {
    if (text.trim().length === 0) {
      throw new DnSyntaxError("no RDN found", text, 0);
    }
    const cursor: Cursor = { text, index: 0 };
    const rdns: Rdn[] = [];
    const separators: string[] = [];

    for (;;) {
      rdns.push(this.readRdn(cursor));
      if (cursor.index >= text.length) break;
      const c = text[cursor.index];
      if (c !== "," && c !== ";") {
        throw new DnSyntaxError(`unexpected character '${c}'`, text, cursor.index);
      }
      separators.push(c);
      cursor.index++;
    }
    return new Dn(rdns, separators);
  }

  /** Parse text holding exactly one RDN. */
  public static parseRdn(text: string): Rdn {
    if (text.trim().length === 0) {
      throw new DnSyntaxError("no RDN found", text, 0);
    }
    const cursor: Cursor = { text, index: 0 };
    const rdn = this.readRdn(cursor);
    if (cursor.index < text.length) {
      throw new DnSyntaxError(
        `unexpected character '${text[cursor.index]}' after the RDN`,
        text,
        cursor.index,
      );
    }
    return rdn;
  }

  private static readRdn(cursor: Cursor): Rdn {
    const start = cursor.index;
    this.skipSpaces(cursor);
    const type = this.readAttributeType(cursor);
    this.skipSpaces(cursor);
    this.expectEquals(cursor);
    this.skipSpaces(cursor);
    const value = this.readValue(cursor);
    this.skipSpaces(cursor);

    const upName = cursor.text.slice(start, cursor.index);
    const normalizedType = isDigit(type[0]) ? type : type.toLowerCase();
    const ava = new Ava(type, normalizedType, value, value, upName);
    return new Rdn([ava], upName);
  }

  private static skipSpaces(cursor: Cursor): void {
    while (cursor.index < cursor.text.length && cursor.text[cursor.index] === " ") {
      cursor.index++;
    }
  }

  private static readAttributeType(cursor: Cursor): string {
    const { text } = cursor;
    if (cursor.index >= text.length) {
      throw new DnSyntaxError("attribute type expected", text, cursor.index);
    }
    const c = text[cursor.index];
    if (isAlpha(c)) return this.readDescriptor(cursor);
    if (isDigit(c)) return this.readNumericOid(cursor);
    throw new DnSyntaxError(`unexpected character '${c}' at the start of an attribute type`, text, cursor.index);
  }

  private static readDescriptor(cursor: Cursor): string {
    const { text } = cursor;
    const start = cursor.index;
    while (cursor.index < text.length) {
      const c = text[cursor.index];
      if (c === " " || c === "=") break;
      if (c === ".") throw new TooComplexDnError(text, cursor.index);
      if (!isKeyChar(c)) {
        throw new DnSyntaxError(`unexpected character '${c}' in attribute type`, text, cursor.index);
      }
      cursor.index++;
    }
    return text.slice(start, cursor.index);
  }

  private static readNumericOid(cursor: Cursor): string {
    const { text } = cursor;
    const start = cursor.index;
    while (cursor.index < text.length) {
      const c = text[cursor.index];
      if (c === " " || c === "=") break;
      if (!isDigit(c) && c !== ".") {
        throw new DnSyntaxError(`unexpected character '${c}' in numeric OID`, text, cursor.index);
      }
      cursor.index++;
    }
    const oid = text.slice(start, cursor.index);
    if (!NUMERIC_OID.test(oid) || !Oid.isValid(oid)) {
      throw new DnSyntaxError(`'${oid}' is not a valid numeric OID`, text, start);
    }
    return oid;
  }

  private static expectEquals(cursor: Cursor): void {
    const { text } = cursor;
    if (cursor.index >= text.length || text[cursor.index] !== "=") {
      throw new DnSyntaxError("'=' expected", text, cursor.index);
    }
    cursor.index++;
  }

  /**
   * Value up to the next separator, without trailing spaces. The cursor stops
   * right after the last non-space character.
   */
  private static readValue(cursor: Cursor): string {
    const { text } = cursor;
    const start = cursor.index;
    let end = start;
    let i = start;
    for (; i < text.length; i++) {
      const c = text[i];
      if (c === "," || c === ";") break;
      if (c === "\\" || c === "+" || c === "#" || c === '"') {
        throw new TooComplexDnError(text, i);
      }
      if (c !== " ") end = i + 1;
    }
    cursor.index = end;
    return text.slice(start, end);
  }
}
