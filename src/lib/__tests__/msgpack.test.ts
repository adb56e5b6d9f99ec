import { describe, test, expect } from "vitest";
import { decode, encode } from "@msgpack/msgpack";
import { Packer, Unpacker } from "../msgpack.js";
import { isDiagnosticError } from "../../diagnostics/index.js";

describe("MessagePack primitives", () => {
  test("packs headers and scalars the stock decoder understands", () => {
    const packer = new Packer(16);
    packer.packMapHeader(3);
    packer.packString("id");
    packer.packInteger(300);
    packer.packString("tags");
    packer.packArrayHeader(2);
    packer.packString("a");
    packer.packNull();
    packer.packString("ratio");
    packer.packFloat(0.5);

    expect(decode(packer.toBytes())).toEqual({
      id: 300,
      tags: ["a", null],
      ratio: 0.5,
    });
  });

  test("chooses compact integer encodings", () => {
    const packer = new Packer();
    packer.packInteger(5);
    packer.packInteger(-3);
    packer.packInteger(200);
    packer.packInteger(-200);
    expect(Array.from(packer.toBytes())).toEqual([
      0x05, 0xfd, 0xcc, 0xc8, 0xd1, 0xff, 0x38,
    ]);
  });

  test("grows past the initial capacity", () => {
    const packer = new Packer(16);
    const text = "x".repeat(300);
    packer.packString(text);
    expect(packer.length).toBe(303);
    expect(new Unpacker(packer.toBytes()).readString()).toBe(text);
  });

  test("reads values written by the stock encoder", () => {
    const unpacker = new Unpacker(
      encode([1, -1, 70000, 2 ** 40, "hi", true, new Uint8Array([1, 2])])
    );
    expect(unpacker.readArrayHeader()).toBe(7);
    expect(unpacker.readInteger()).toBe(1);
    expect(unpacker.readInteger()).toBe(-1);
    expect(unpacker.readInteger()).toBe(70000);
    expect(unpacker.readInteger()).toBe(2 ** 40);
    expect(unpacker.readString()).toBe("hi");
    expect(unpacker.readBoolean()).toBe(true);
    expect(Array.from(unpacker.readBinary())).toEqual([1, 2]);
    expect(unpacker.remaining).toBe(0);
  });

  test("skips nested values", () => {
    const unpacker = new Unpacker(encode([{ a: [1, 2, { b: "c" }] }, 9]));
    expect(unpacker.readArrayHeader()).toBe(2);
    unpacker.skip();
    expect(unpacker.readInteger()).toBe(9);
  });

  test("packAny and readAny agree on plain data", () => {
    const packer = new Packer();
    packer.packAny({ foo: 1, bar: ["baz", true, null, 4] });
    expect(new Unpacker(packer.toBytes()).readAny()).toEqual({
      foo: 1,
      bar: ["baz", true, null, 4],
    });
  });

  test("packAny and readAny agree on dates and maps", () => {
    const packer = new Packer();
    packer.packAny(new Date(0));
    packer.packAny(new Map([[1, "a"], [2, "b"]]));
    packer.packAny({ when: new Date(1000), tags: new Map([["k", [1, 2]]]) });

    const unpacker = new Unpacker(packer.toBytes());
    expect(unpacker.readAny()).toEqual(new Date(0));
    expect(unpacker.readAny()).toEqual({ 1: "a", 2: "b" });
    expect(unpacker.readAny()).toEqual({ when: new Date(1000), tags: { k: [1, 2] } });
    expect(unpacker.remaining).toBe(0);
  });

  test("skips extension values", () => {
    const unpacker = new Unpacker(encode([new Date(0), 9]));
    expect(unpacker.readArrayHeader()).toBe(2);
    unpacker.skip();
    expect(unpacker.readInteger()).toBe(9);
  });

  test("values the stock decoder rejects are invalid messages", () => {
    // map keyed by an array
    const unpacker = new Unpacker(Uint8Array.of(0x81, 0x91, 0x01, 0x02));
    let caught: unknown;
    try {
      unpacker.readAny();
    } catch (error) {
      caught = error;
    }
    expect(isDiagnosticError(caught, "MP0001")).toBe(true);
  });

  test("tryReadNil only consumes nil", () => {
    const unpacker = new Unpacker(encode([null, 1]));
    unpacker.readArrayHeader();
    expect(unpacker.tryReadNil()).toBe(true);
    expect(unpacker.tryReadNil()).toBe(false);
    expect(unpacker.readInteger()).toBe(1);
  });

  test("reports unexpected tokens and truncation", () => {
    const wrongType = new Unpacker(encode("text"));
    expect(() => wrongType.readInteger()).toThrow(/expected integer, found 0xa4/);

    const truncated = new Unpacker(new Uint8Array([0xa5, 0x61]));
    let caught: unknown;
    try {
      truncated.readString();
    } catch (error) {
      caught = error;
    }
    expect(isDiagnosticError(caught, "MP0001")).toBe(true);
  });
});
