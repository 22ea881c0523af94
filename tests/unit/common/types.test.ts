import { describe, expect, it } from "vitest";
import { TagClass, describeTag, makeTag, tagClassOf } from "../../../src/common/types.js";

describe("tag helpers", () => {
  it.each([
    [0x30, TagClass.Universal],
    [0x65, TagClass.Application],
    [0xa3, TagClass.ContextSpecific],
    [0xc1, TagClass.Private],
  ])("reads the class of tag %d", (tag, tagClass) => {
    expect(tagClassOf(tag)).toBe(tagClass);
  });

  it("builds tags that read back to the same class", () => {
    const tag = makeTag(TagClass.ContextSpecific, true, 3);
    expect(tag).toBe(0xa3);
    expect(tagClassOf(tag)).toBe(TagClass.ContextSpecific);
    expect(describeTag(tag)).toBe("0xa3 (CONTEXT 3, constructed)");
  });

  it("refuses tag numbers above 30", () => {
    expect(() => makeTag(TagClass.Universal, false, 31)).toThrow(/high-tag-number/);
  });
});
