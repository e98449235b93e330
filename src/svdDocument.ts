import { XMLBuilder } from "fast-xml-parser";

export const REGISTER_SIZE_BITS = 32;

export interface SvdOutField {
  name: string;
  msb: number;
  lsb: number;
}

export interface SvdOutRegister {
  name: string;
  description: string;
  addressOffset: number;
  size: number;
  resetValue: number;
  fields?: SvdOutField[];
}

export interface SvdOutPeripheral {
  name: string;
  description: string;
  baseAddress: number;
  registers: SvdOutRegister[];
}

export interface SvdOutDevice {
  name: string;
  peripherals: SvdOutPeripheral[];
}

export function formatHex(value: number): string {
  return `0x${value.toString(16)}`;
}

export function formatBitRange(field: SvdOutField): string {
  return `[${field.msb}:${field.lsb}]`;
}

/** Owns the device tree while peripherals are discovered. */
export class SvdDocumentBuilder {
  private readonly root: SvdOutDevice;

  constructor(name: string) {
    this.root = { name, peripherals: [] };
  }

  get device(): SvdOutDevice {
    return this.root;
  }

  openPeripheral(name: string, baseAddress: number): SvdOutPeripheral {
    const peripheral: SvdOutPeripheral = {
      name,
      description: `${name} peripheral`,
      baseAddress,
      registers: [],
    };
    this.root.peripherals.push(peripheral);
    return peripheral;
  }
}

type XmlNode = string | XmlObject | XmlObject[];
interface XmlObject {
  [tag: string]: XmlNode;
}

function registerNode(register: SvdOutRegister): XmlObject {
  const node: XmlObject = {
    name: register.name,
    description: register.description,
    addressOffset: formatHex(register.addressOffset),
    size: String(register.size),
    resetValue: String(register.resetValue),
  };
  if (register.fields) {
    node.fields = {
      field: register.fields.map((field) => ({ name: field.name, bitRange: formatBitRange(field) })),
    };
  }
  return node;
}

function peripheralNode(peripheral: SvdOutPeripheral): XmlObject {
  return {
    name: peripheral.name,
    description: peripheral.description,
    baseAddress: formatHex(peripheral.baseAddress),
    registers: peripheral.registers.length > 0 ? { register: peripheral.registers.map(registerNode) } : "",
  };
}

export function renderSvd(device: SvdOutDevice): string {
  const builder = new XMLBuilder({
    format: true,
    indentBy: "  ",
    suppressEmptyNode: false,
  });
  const doc: XmlObject = {
    device: {
      name: device.name,
      peripherals:
        device.peripherals.length > 0 ? { peripheral: device.peripherals.map(peripheralNode) } : "",
    },
  };
  const body = String(builder.build(doc));
  return `<?xml version="1.0" encoding="utf-8"?>\n${body}`;
}
