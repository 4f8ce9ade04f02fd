import { describe, test, expect } from "vitest";
import {
  charKey,
  controlKey,
  keysFromInk,
  pendingKeys,
  type InkKeyFlags,
} from "../keys.js";
import { EMPTY_PENDING } from "../types.js";

function inkKey(flags: Partial<InkKeyFlags> = {}): InkKeyFlags {
  return {
    escape: false,
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    return: false,
    tab: false,
    backspace: false,
    delete: false,
    ctrl: false,
    ...flags,
  };
}

describe("keysFromInk", () => {
  test("printable input becomes a char key", () => {
    expect(keysFromInk("x", inkKey())).toEqual([charKey("x")]);
  });

  test("multi-character input splits into one key per character", () => {
    expect(keysFromInk("dw", inkKey())).toEqual([charKey("d"), charKey("w")]);
  });

  test("escape and arrows become control keys", () => {
    expect(keysFromInk("", inkKey({ escape: true }))).toEqual([controlKey("escape")]);
    expect(keysFromInk("", inkKey({ leftArrow: true }))).toEqual([controlKey("left")]);
    expect(keysFromInk("", inkKey({ upArrow: true }))).toEqual([controlKey("up")]);
  });

  test("ctrl chords are lowercased", () => {
    expect(keysFromInk("R", inkKey({ ctrl: true }))).toEqual([controlKey("ctrl+r")]);
  });

  test("empty input without flags yields no keys", () => {
    expect(keysFromInk("", inkKey())).toEqual([]);
  });
});

describe("pendingKeys", () => {
  test("empty composition shows nothing", () => {
    expect(pendingKeys(EMPTY_PENDING)).toBe("");
  });

  test("count then operator", () => {
    expect(pendingKeys({ ...EMPTY_PENDING, count: "2", operator: "delete" })).toBe("2d");
  });

  test("operator waiting for a search character", () => {
    expect(
      pendingKeys({ ...EMPTY_PENDING, operator: "change", awaitedChar: "till-forward" }),
    ).toBe("ct");
  });

  test("first g of gg", () => {
    expect(pendingKeys({ ...EMPTY_PENDING, count: "3", awaitingSecondG: true })).toBe("3g");
  });
});
