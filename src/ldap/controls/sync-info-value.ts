import { decodeBoolean } from "../../common/codecs.js";
import { DecoderError } from "../../common/errors.js";
import { UniversalTag } from "../../common/types.js";
import { BasicTLVBuilder } from "../../builder/basic-builder.js";
import { ByteWriter } from "../../builder/byte-writer.js";
import type { DecodeContainer } from "../../parser/container.js";
import { Grammar } from "../../parser/grammar.js";
import { StatefulDecoder, type DecoderOptions } from "../../parser/stateful-decoder.js";
import { Control, type Encodable } from "../control.js";

/** Content synchronization sync info message (RFC 4533). */
export const SYNC_INFO_VALUE_OID = "1.3.6.1.4.1.4203.1.9.1.4";

/** The `refreshPresent [2]` alternative of syncInfoValue. */
export const SYNC_INFO_REFRESH_PRESENT_TAG = 0xa2;

export interface RefreshPresentData {
  cookie?: Uint8Array;
  refreshDone: boolean;
}

export const SyncInfoState = {
  Start: "START",
  RefreshPresent: "REFRESH_PRESENT",
  Cookie: "COOKIE",
  RefreshDone: "REFRESH_DONE",
} as const;
export type SyncInfoState = (typeof SyncInfoState)[keyof typeof SyncInfoState];

type Container = DecodeContainer<SyncInfoState, RefreshPresentData>;

function setRefreshDone(c: Container): void {
  c.value.refreshDone = decodeBoolean(c.currentTlv.value);
}

/**
 * `refreshPresent [2] SEQUENCE { cookie syncCookie OPTIONAL, refreshDone BOOLEAN DEFAULT TRUE }`
 */
export const syncInfoRefreshPresentGrammar = new Grammar<
  SyncInfoState,
  RefreshPresentData,
  RefreshPresentData
>({
  name: "SyncInfoRefreshPresent",
  initialState: SyncInfoState.Start,
  transitions: [
    {
      from: SyncInfoState.Start,
      tag: SYNC_INFO_REFRESH_PRESENT_TAG,
      to: SyncInfoState.RefreshPresent,
      endAllowed: true,
    },
    {
      from: SyncInfoState.RefreshPresent,
      tag: UniversalTag.OctetString,
      to: SyncInfoState.Cookie,
      endAllowed: true,
      action: (c) => {
        c.value.cookie = c.currentTlv.value.slice();
      },
    },
    {
      from: SyncInfoState.RefreshPresent,
      tag: UniversalTag.Boolean,
      to: SyncInfoState.RefreshDone,
      endAllowed: true,
      action: setRefreshDone,
    },
    {
      from: SyncInfoState.Cookie,
      tag: UniversalTag.Boolean,
      to: SyncInfoState.RefreshDone,
      endAllowed: true,
      action: setRefreshDone,
    },
  ],
  create: () => ({ refreshDone: true }),
  finish: (draft) => draft,
});

export interface RefreshPresentLayout {
  readonly contentLength: number;
  readonly frameLength: number;
}

/**
 * Value of a sync info message announcing the end of a present phase.
 */
export class SyncInfoRefreshPresent implements Encodable<RefreshPresentLayout> {
  public readonly refreshDone: boolean;
  private readonly cookieBytes: Uint8Array | undefined;

  public constructor(cookie?: Uint8Array, refreshDone = true) {
    this.cookieBytes = cookie === undefined ? undefined : cookie.slice();
    this.refreshDone = refreshDone;
  }

  public static decode(bytes: Uint8Array, options?: DecoderOptions): SyncInfoRefreshPresent {
    const data = StatefulDecoder.decodeOne(syncInfoRefreshPresentGrammar, bytes, options);
    return new SyncInfoRefreshPresent(data.cookie, data.refreshDone);
  }

  public static fromControl(control: Control, options?: DecoderOptions): SyncInfoRefreshPresent {
    const value = control.value;
    if (control.oid !== SYNC_INFO_VALUE_OID || value === undefined) {
      throw new DecoderError(`${control.toString()} is not a sync info message`);
    }
    return SyncInfoRefreshPresent.decode(value, options);
  }

  public get cookie(): Uint8Array | undefined {
    return this.cookieBytes === undefined ? undefined : this.cookieBytes.slice();
  }

  public computeLength(): RefreshPresentLayout {
    const contentLength =
      (this.cookieBytes === undefined ? 0 : BasicTLVBuilder.tlvLength(this.cookieBytes.length)) +
      (this.refreshDone ? 0 : 3);
    return { contentLength, frameLength: BasicTLVBuilder.tlvLength(contentLength) };
  }

  public encode(writer: ByteWriter, layout: RefreshPresentLayout): ByteWriter {
    writer.putHeader(SYNC_INFO_REFRESH_PRESENT_TAG, layout.contentLength);
    if (this.cookieBytes !== undefined) writer.putOctetString(this.cookieBytes);
    // DEFAULT TRUE
    if (!this.refreshDone) writer.putBoolean(false);
    return writer;
  }

  public toBytes(): Uint8Array {
    const layout = this.computeLength();
    return this.encode(new ByteWriter(layout.frameLength), layout).finish();
  }

  public toControl(critical = false): Control {
    return new Control(SYNC_INFO_VALUE_OID, critical, this.toBytes());
  }
}
