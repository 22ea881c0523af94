/**
 * Value codecs for the BER primitives carried in LDAP PDUs
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8");

export function toHex(input: Uint8Array): string {
  return Array.from(input)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-fA-F]/.test(clean)) {
    throw new Error(`Invalid hex string: '${hex}'`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function concatBytes(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

export function equalBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function encodeUtf8(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Minimal two's complement content octets of an INTEGER or ENUMERATED.
 */
export function encodeInteger(n: number): Uint8Array {
  if (!Number.isInteger(n) || n < -0x80000000 || n > 0x7fffffff) {
    throw new Error(`INTEGER must be a 32-bit signed integer; got ${n}`);
  }
  const out: number[] = [];
  let temp = n;
  do {
    out.unshift(temp & 0xff);
    temp >>= 8;
  } while (
    !(temp === 0 && (out[0] & 0x80) === 0) &&
    !(temp === -1 && (out[0] & 0x80) !== 0)
  );
  return new Uint8Array(out);
}

export function decodeInteger(bytes: Uint8Array): number {
  if (bytes.length === 0) {
    throw new Error("INTEGER value must have at least one content octet");
  }
  if (bytes.length > 6) {
    throw new Error(`INTEGER of ${bytes.length} octets exceeds the supported range`);
  }
  let n = bytes[0] & 0x80 ? bytes[0] - 256 : bytes[0];
  for (let i = 1; i < bytes.length; i++) n = n * 256 + bytes[i];
  return n;
}

export function encodeBoolean(value: boolean): Uint8Array {
  return new Uint8Array([value ? 0xff : 0x00]);
}

export function decodeBoolean(bytes: Uint8Array): boolean {
  if (bytes.length !== 1) {
    throw new Error(
      `BOOLEAN value must be exactly one octet; got ${bytes.length}`,
    );
  }
  return bytes[0] !== 0x00;
}
