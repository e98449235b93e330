import { NO_PORTALS, decodePortals, decodeResetPattern, firstToken, parseAddressLiteral } from "./attributes";
import { EdcDocument, InputRegisterDescriptor, PeripheralHints, readSectorRegisters } from "./edc";
import { ConversionError } from "./errors";
import { buildFieldLayout } from "./fieldLayout";
import { ConversionLog } from "./log";
import { synthesizeRegisters } from "./registers";
import { SvdDocumentBuilder, SvdOutPeripheral, formatHex } from "./svdDocument";

/** Peripheral labels for registers that only carry a module source reference. */
export const MODULE_SOURCE_PERIPHERALS: ReadonlyMap<string, string> = new Map([
  ["DOS-01618_RPINRx.Module", "PPS"],
  ["DOS-01618_RPORx.Module", "PPS"],
  ["DOS-01423_RPINRx.Module", "PPS"],
  ["DOS-01423_RPORx.Module", "PPS"],
  ["DOS-01475_lpwr_deep_sleep_ctrl_v2.Module", "DSCTRL"],
]);

export interface GroupingOptions {
  segmentMask: number;
  strictFieldWidth?: boolean;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

export function inferPeripheralName(registerName: string, hints: PeripheralHints): string {
  let hint = nonEmpty(hints.baseOfPeripheral) ?? nonEmpty(hints.memberOfPeripheral) ?? nonEmpty(hints.group);
  if (hint === undefined && hints.moduleSource !== undefined) {
    hint = MODULE_SOURCE_PERIPHERALS.get(hints.moduleSource);
    if (hint === undefined) {
      throw new ConversionError(
        "UnknownModuleSource",
        `undefined peripheral for ${registerName} (module source "${hints.moduleSource}")`
      );
    }
  }
  const label = hint === undefined ? "" : firstToken(hint);
  if (!label) {
    throw new ConversionError("MissingPeripheralHint", `missing peripheral for ${registerName}`);
  }
  return label;
}

/** Registers of every sector whose region id starts with `regionPrefix`, in document order. */
export function collectPeripheralRegisters(document: EdcDocument, regionPrefix: string): InputRegisterDescriptor[] {
  return document.sectors
    .filter((sector) => sector.regionId.startsWith(regionPrefix))
    .flatMap(readSectorRegisters);
}

interface OpenGroup {
  label: string;
  peripheral: SvdOutPeripheral;
}

/**
 * Assigns registers to peripherals in input order. A new peripheral starts
 * whenever the inferred label changes; its base address is the address of its
 * first register.
 */
export function groupPeripherals(
  registers: Iterable<InputRegisterDescriptor>,
  builder: SvdDocumentBuilder,
  log: ConversionLog,
  options: GroupingOptions
): void {
  let current: OpenGroup | undefined;
  for (const register of registers) {
    const address = (parseAddressLiteral(register.address) | options.segmentMask) >>> 0;
    const portals = decodePortals(register.portals);
    const resetValue = decodeResetPattern(register.resetPattern);

    if (register.cname !== register.name) {
      throw new ConversionError(
        "NameMismatch",
        `register cname "${register.cname}" does not match name "${register.name}"`
      );
    }

    const label = inferPeripheralName(register.name, register.hints);
    if (!register.modeEntries) {
      throw new ConversionError("MissingElement", `SFRModeList/SFRMode element missing in ${register.name}`);
    }

    if (!current || current.label !== label) {
      const previousBase = current?.peripheral.baseAddress;
      if (previousBase !== undefined && address <= previousBase) {
        throw new ConversionError(
          "AddressOrderingViolation",
          `peripheral ${label} at ${formatHex(address)} does not follow ${current?.label} at ${formatHex(previousBase)}`
        );
      }
      current = { label, peripheral: builder.openPeripheral(label, address) };
      log.info(`${label} base_addr = ${formatHex(address)}`);
    }

    const base = current.peripheral.baseAddress;
    if (address < base) {
      throw new ConversionError(
        "AddressOrderingViolation",
        `register ${register.name} at ${formatHex(address)} lies below ${label} base ${formatHex(base)}`
      );
    }
    const offset = address - base;
    log.info(`  ${register.name}`);
    log.info(
      `\t${register.name}: ${formatHex(address)}, offset = ${formatHex(offset)}, reset = ${formatHex(resetValue)} (${register.portals ?? NO_PORTALS})`
    );

    const layout = buildFieldLayout(register.name, register.modeEntries, log, {
      strictFieldWidth: options.strictFieldWidth,
    });
    const emitted = synthesizeRegisters(current.peripheral, { name: register.name, offset, resetValue, portals }, layout);
    for (const variant of emitted.slice(1)) {
      log.info(`\t${variant.name}: ${formatHex(base + variant.addressOffset)}, offset = ${formatHex(variant.addressOffset)}`);
    }
  }
}
