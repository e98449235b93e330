import { describe, it, expect } from "vitest";
import { decodePortals, decodeResetPattern, firstToken, parseAddressLiteral } from "../attributes";
import { errorCodeOf } from "./helpers";

describe("parseAddressLiteral", () => {
  it("parses hexadecimal and decimal literals", () => {
    expect(parseAddressLiteral("0x1A")).toBe(26);
    expect(parseAddressLiteral("26")).toBe(26);
    expect(parseAddressLiteral("0xbf886000")).toBe(0xbf886000);
    expect(parseAddressLiteral("0xFFFFFFFF")).toBe(4294967295);
    expect(parseAddressLiteral("007")).toBe(7);
  });

  it("rejects text that is neither hex nor decimal", () => {
    expect(errorCodeOf(() => parseAddressLiteral(""))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral("0x"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral("1A"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral("-1"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral("0X1A"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral(" 26"))).toBe("MalformedNumber");
  });

  it("rejects values wider than 32 bits", () => {
    expect(errorCodeOf(() => parseAddressLiteral("0x100000000"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => parseAddressLiteral("4294967296"))).toBe("MalformedNumber");
  });
});

describe("decodeResetPattern", () => {
  it("reads placeholder bits as zero", () => {
    expect(decodeResetPattern("1-0xu")).toBe(16);
    expect(decodeResetPattern("--------")).toBe(0);
    expect(decodeResetPattern("1111")).toBe(15);
  });

  it("accepts a full 32-bit pattern", () => {
    expect(decodeResetPattern("1".repeat(32))).toBe(0xffffffff);
    expect(decodeResetPattern(`${"0".repeat(39)}1`)).toBe(1);
  });

  it("rejects non-binary and oversized patterns", () => {
    expect(errorCodeOf(() => decodeResetPattern("10a1"))).toBe("MalformedNumber");
    expect(errorCodeOf(() => decodeResetPattern(""))).toBe("MalformedNumber");
    expect(errorCodeOf(() => decodeResetPattern("1".repeat(33)))).toBe("MalformedNumber");
  });
});

describe("decodePortals", () => {
  it("recognizes the three portal forms", () => {
    expect(decodePortals("CLR SET INV")).toEqual({ clr: true, set: true, inv: true });
    expect(decodePortals("CLR - -")).toEqual({ clr: true, set: false, inv: false });
    expect(decodePortals("- - -")).toEqual({ clr: false, set: false, inv: false });
  });

  it("treats a missing attribute as no portals", () => {
    expect(decodePortals(undefined)).toEqual({ clr: false, set: false, inv: false });
  });

  it("rejects any other form", () => {
    expect(errorCodeOf(() => decodePortals("CLR SET -"))).toBe("UnrecognizedPortalsSpec");
    expect(errorCodeOf(() => decodePortals(""))).toBe("UnrecognizedPortalsSpec");
    expect(errorCodeOf(() => decodePortals("toString"))).toBe("UnrecognizedPortalsSpec");
  });
});

describe("firstToken", () => {
  it("keeps the first whitespace-delimited word", () => {
    expect(firstToken("PORTA PORTB")).toBe("PORTA");
    expect(firstToken("  RTCC\tclock")).toBe("RTCC");
    expect(firstToken("UART1")).toBe("UART1");
    expect(firstToken("   ")).toBe("");
  });
});
