import { encodeUtf8, equalBytes } from "../common/codecs.js";
import { OidSyntaxError } from "../common/errors.js";
import { Oid } from "../common/oid.js";
import { UniversalTag } from "../common/types.js";
import { BasicTLVBuilder } from "../builder/basic-builder.js";
import { ByteWriter } from "../builder/byte-writer.js";

/**
 * Sizes computed by the length pass and consumed by the write pass.
 */
export interface ControlLayout {
  readonly valueLength: number;
  /** Length of the control SEQUENCE's contents. */
  readonly controlLength: number;
  /** Length of the whole control TLV. */
  readonly frameLength: number;
}

export interface ControlData {
  readonly oid: string;
  readonly critical: boolean;
  readonly value?: Uint8Array;
}

/**
 * Anything that writes itself in two passes: a length pass producing a layout,
 * then a write pass into a writer sized from it.
 */
export interface Encodable<L> {
  computeLength(): L;
  encode(writer: ByteWriter, layout: L): ByteWriter;
}

/**
 * Immutable request or response control.
 *
 * @example
 * ```ts
 * const bytes = encodeControl(new Control("1.2.840.113556.1.4.473", true));
 * ```
 */
export class Control implements ControlData, Encodable<ControlLayout> {
  public readonly oid: string;
  public readonly critical: boolean;
  private readonly valueBytes: Uint8Array | undefined;

  public constructor(oid: string, critical = false, value?: Uint8Array) {
    if (!Oid.isValid(oid)) {
      throw new OidSyntaxError("not a control type", oid);
    }
    this.oid = oid;
    this.critical = critical;
    this.valueBytes = value === undefined ? undefined : value.slice();
  }

  public static from(data: ControlData): Control {
    return new Control(data.oid, data.critical, data.value);
  }

  /** A copy of the value bytes; `undefined` when the control carries none. */
  public get value(): Uint8Array | undefined {
    return this.valueBytes?.slice();
  }

  public get hasValue(): boolean {
    return this.valueBytes !== undefined;
  }

  public computeLength(): ControlLayout {
    return computeControlLayout(this);
  }

  public encode(writer: ByteWriter, layout: ControlLayout): ByteWriter {
    writer.putHeader(UniversalTag.Sequence, layout.controlLength);
    writer.putOctetString(this.oid);
    if (this.critical) writer.putBoolean(true);
    if (layout.valueLength > 0 && this.valueBytes !== undefined) {
      writer.putOctetString(this.valueBytes);
    }
    return writer;
  }

  public equals(other: ControlData): boolean {
    if (this.oid.toLowerCase() !== other.oid.toLowerCase()) return false;
    if (this.critical !== other.critical) return false;
    const mine = this.valueBytes;
    const theirs = other.value;
    if (mine === undefined || theirs === undefined) return mine === theirs;
    return equalBytes(mine, theirs);
  }

  public toString(): string {
    return `Control(${this.oid}, critical=${this.critical}, value=${
      this.valueBytes === undefined ? "none" : `${this.valueBytes.length} bytes`
    })`;
  }
}

export function computeControlLayout(control: ControlData): ControlLayout {
  const oidLength = encodeUtf8(control.oid).length;
  const valueLength = control.value?.length ?? 0;

  let controlLength = 1 + BasicTLVBuilder.lengthOfLength(oidLength) + oidLength;
  if (control.critical) controlLength += 3;
  if (valueLength > 0) controlLength += BasicTLVBuilder.tlvLength(valueLength);

  return {
    valueLength,
    controlLength,
    frameLength: BasicTLVBuilder.tlvLength(controlLength),
  };
}

export function encodeControl(control: Control): Uint8Array {
  const layout = control.computeLength();
  return control.encode(new ByteWriter(layout.frameLength), layout).finish();
}
