import { parseAddressLiteral } from "./attributes";
import { ConversionError } from "./errors";
import { ConversionLog } from "./log";
import { REGISTER_SIZE_BITS, SvdOutField, formatBitRange } from "./svdDocument";

export type ModeEntry =
  | { kind: "field"; name: string; cname: string; width: string }
  | { kind: "adjust"; offset: string }
  | { kind: "other"; element: string };

export interface FieldLayout {
  fields: SvdOutField[];
  /** Bits consumed by fields and adjust points; 0 means the register has no field information. */
  bitCursor: number;
}

export interface FieldLayoutOptions {
  strictFieldWidth?: boolean;
}

export function buildFieldLayout(
  registerName: string,
  entries: readonly ModeEntry[],
  log: ConversionLog,
  options: FieldLayoutOptions = {}
): FieldLayout {
  const fields: SvdOutField[] = [];
  let bitCursor = 0;
  for (const entry of entries) {
    switch (entry.kind) {
      case "field": {
        if (entry.cname !== entry.name) {
          log.warn(`cname = ${entry.cname} but name = ${entry.name}`);
        }
        const width = parseAddressLiteral(entry.width);
        if (width === 0) {
          throw new ConversionError(
            "UnexpectedFieldEntry",
            `field ${entry.cname} of ${registerName} has zero width`
          );
        }
        const field: SvdOutField = { name: entry.cname, msb: bitCursor + width - 1, lsb: bitCursor };
        log.info(`\t\t${formatBitRange(field)}\t${field.name}`);
        fields.push(field);
        bitCursor += width;
        break;
      }
      case "adjust":
        bitCursor += parseAddressLiteral(entry.offset);
        break;
      default:
        throw new ConversionError(
          "UnexpectedFieldEntry",
          `unexpected element ${entry.element} in field definition of ${registerName}`
        );
    }
  }
  if (bitCursor > REGISTER_SIZE_BITS) {
    const message = `fields of ${registerName} span ${bitCursor} bits, more than ${REGISTER_SIZE_BITS}`;
    if (options.strictFieldWidth) {
      throw new ConversionError("FieldWidthOverflow", message);
    }
    log.warn(message);
  }
  return { fields, bitCursor };
}
