import { describe, test, expect, beforeEach } from "vitest";
import { Register } from "../registers.js";

describe("Register", () => {
  let register: Register;

  beforeEach(() => {
    register = new Register();
  });

  test("starts empty", () => {
    expect(register.get()).toBeNull();
  });

  test("stores text with its type", () => {
    register.store("hello ", "char");
    expect(register.get()).toEqual({ text: "hello ", type: "char" });
  });

  test("overwrites previous content", () => {
    register.store("first", "char");
    register.store("second\n", "line");
    expect(register.get()).toEqual({ text: "second\n", type: "line" });
  });

  test("empty text reads as nothing to paste", () => {
    register.store("", "char");
    expect(register.get()).toBeNull();
  });

  test("get does not clear", () => {
    register.store("abc", "char");
    register.get();
    expect(register.get()?.text).toBe("abc");
  });
});
