import { ConversionError } from "./errors";

const MAX_U32 = 0xffffffff;

export interface PortalFlags {
  clr: boolean;
  set: boolean;
  inv: boolean;
}

export const NO_PORTALS = "- - -";

const PORTAL_FORMS: Readonly<Record<string, PortalFlags>> = {
  "CLR SET INV": { clr: true, set: true, inv: true },
  "CLR - -": { clr: true, set: false, inv: false },
  [NO_PORTALS]: { clr: false, set: false, inv: false },
};

function checkU32(value: number, text: string): number {
  if (!Number.isSafeInteger(value) || value > MAX_U32) {
    throw new ConversionError("MalformedNumber", `number out of 32-bit range: "${text}"`);
  }
  return value;
}

/** Parses `0x`-prefixed hexadecimal or plain decimal text into an unsigned 32-bit value. */
export function parseAddressLiteral(text: string): number {
  const hex = /^0x([0-9a-fA-F]+)$/.exec(text);
  if (hex) {
    return checkU32(Number.parseInt(hex[1], 16), text);
  }
  if (/^[0-9]+$/.test(text)) {
    return checkU32(Number.parseInt(text, 10), text);
  }
  throw new ConversionError("MalformedNumber", `cannot parse number "${text}"`);
}

/**
 * Decodes an `mclr` bit pattern. Unimplemented (`-`), undefined (`x`) and
 * unknown (`u`) bits read as 0.
 */
export function decodeResetPattern(text: string): number {
  const bits = text.replace(/[-xu]/g, "0");
  if (!/^[01]+$/.test(bits)) {
    throw new ConversionError("MalformedNumber", `cannot parse mclr attribute string "${text}"`);
  }
  const significant = bits.replace(/^0+/, "");
  if (significant.length > 32) {
    throw new ConversionError("MalformedNumber", `mclr attribute string "${text}" exceeds 32 bits`);
  }
  return significant ? Number.parseInt(significant, 2) : 0;
}

export function decodePortals(text: string | undefined): PortalFlags {
  const form = text ?? NO_PORTALS;
  const flags = Object.prototype.hasOwnProperty.call(PORTAL_FORMS, form) ? PORTAL_FORMS[form] : undefined;
  if (!flags) {
    throw new ConversionError("UnrecognizedPortalsSpec", `unexpected portals attribute: "${form}"`);
  }
  return { ...flags };
}

export function firstToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? "";
}
