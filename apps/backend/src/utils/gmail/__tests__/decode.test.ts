import * as libqp from "libqp";
import { describe, it, expect, vi } from "vitest";

import { decodePartData } from "../decode";

vi.mock("libqp", async (importOriginal) => {
  const actual = await importOriginal<typeof import("libqp")>();
  return {
    ...actual,
    decode: vi.fn(actual.decode),
  };
});

function toBase64Url(bytes: Buffer | string): string {
  return Buffer.from(bytes).toString("base64url");
}

describe("decodePartData", () => {
  it("should return empty string for empty or absent input", () => {
    expect(decodePartData("")).toBe("");
    expect(decodePartData(null)).toBe("");
    expect(decodePartData(undefined)).toBe("");
  });

  it("should decode unpadded base64url text", () => {
    expect(decodePartData("SGVsbG8gd29ybGQh")).toBe("Hello world!");
    expect(decodePartData(toBase64Url("Hello world!"))).toBe("Hello world!");
  });

  it("should decode data that needs padding", () => {
    // "Hi" -> "SGk" without its trailing "="
    expect(decodePartData("SGk")).toBe("Hi");
  });

  it("should accept data that is already padded", () => {
    expect(decodePartData("SGVsbG8gV29ybGQ=")).toBe("Hello World");
  });

  it("should decode the URL-safe alphabet", () => {
    expect(decodePartData("Pz8_")).toBe("???");
    expect(decodePartData("Pj4-Pw")).toBe(">>>?");
  });

  it("should decode multi-byte UTF-8 text", () => {
    const text = "Grüße aus München ✉";
    expect(decodePartData(toBase64Url(text))).toBe(text);
  });

  it("should return empty string for characters outside the alphabet", () => {
    expect(decodePartData("!!!not base64!!!")).toBe("");
    expect(decodePartData("SGVs bG8=")).toBe("");
  });

  it("should return empty string for misplaced padding", () => {
    expect(decodePartData("SG=VsbG8")).toBe("");
  });

  it("should return empty string for an impossible data length", () => {
    // 5 data characters cannot come from whole bytes
    expect(decodePartData("SGVsb")).toBe("");
  });

  it("should quoted-printable decode bytes that are not valid UTF-8", () => {
    const bytes = Buffer.concat([
      Buffer.from("caf=C3=A9 ", "latin1"),
      Buffer.from([0xff]),
    ]);
    expect(decodePartData(toBase64Url(bytes))).toBe("café \uFFFD");
  });

  it("should replace invalid sequences when there is nothing to unescape", () => {
    const bytes = Buffer.from([0x68, 0x69, 0xff]);
    expect(decodePartData(toBase64Url(bytes))).toBe("hi\uFFFD");
  });

  it("should leave valid UTF-8 quoted-printable text undecoded", () => {
    // Valid UTF-8 is returned as-is, escapes included
    expect(decodePartData(toBase64Url("caf=C3=A9"))).toBe("caf=C3=A9");
  });

  it("should fall back to lenient UTF-8 when quoted-printable decoding fails", () => {
    vi.mocked(libqp.decode).mockImplementationOnce(() => {
      throw new Error("bad escape");
    });
    const bytes = Buffer.from([0x68, 0x69, 0xff]);
    expect(decodePartData(toBase64Url(bytes))).toBe("hi\uFFFD");
  });
});
