import { ModeEntry } from "./fieldLayout";
import {
  XmlElement,
  childElements,
  firstChild,
  parseXmlTree,
  requireAttribute,
  requireChild,
} from "./xmlTree";

export interface PeripheralHints {
  baseOfPeripheral?: string;
  memberOfPeripheral?: string;
  group?: string;
  moduleSource?: string;
}

/** One `SFRDef` record, attribute values kept as written. */
export interface InputRegisterDescriptor {
  name: string;
  cname: string;
  address: string;
  resetPattern: string;
  portals?: string;
  hints: PeripheralHints;
  /** Children of the first mode of the register; undefined when the mode block is absent. */
  modeEntries?: ModeEntry[];
}

export interface EdcDataSector {
  regionId: string;
  element: XmlElement;
}

export interface EdcDocument {
  name: string;
  sectors: EdcDataSector[];
}

function readModeEntry(element: XmlElement): ModeEntry {
  switch (element.name) {
    case "SFRFieldDef":
      return {
        kind: "field",
        name: requireAttribute(element, "name"),
        cname: requireAttribute(element, "cname"),
        width: requireAttribute(element, "nzwidth"),
      };
    case "AdjustPoint":
      return { kind: "adjust", offset: requireAttribute(element, "offset") };
    default:
      return { kind: "other", element: element.name };
  }
}

function readModeEntries(sfrDef: XmlElement): ModeEntry[] | undefined {
  const modeList = firstChild(sfrDef, "SFRModeList");
  const mode = modeList ? firstChild(modeList, "SFRMode") : undefined;
  return mode?.children.map(readModeEntry);
}

export function readRegisterDescriptor(sfrDef: XmlElement): InputRegisterDescriptor {
  const attrs = sfrDef.attributes;
  return {
    name: requireAttribute(sfrDef, "name"),
    cname: requireAttribute(sfrDef, "cname"),
    address: requireAttribute(sfrDef, "_addr"),
    resetPattern: requireAttribute(sfrDef, "mclr"),
    portals: attrs.portals,
    hints: {
      baseOfPeripheral: attrs.baseofperipheral,
      memberOfPeripheral: attrs.memberofperipheral,
      group: attrs.grp,
      moduleSource: attrs._modsrc,
    },
    modeEntries: readModeEntries(sfrDef),
  };
}

export function readEdcDocument(root: XmlElement): EdcDocument {
  const name = requireAttribute(root, "name");
  const physical = requireChild(root, "PhysicalSpace");
  const sectors = childElements(physical, "SFRDataSector").map((element) => ({
    regionId: element.attributes.regionid ?? "",
    element,
  }));
  return { name, sectors };
}

/** Registers of a sector are only read when asked for. */
export function readSectorRegisters(sector: EdcDataSector): InputRegisterDescriptor[] {
  return childElements(sector.element, "SFRDef").map(readRegisterDescriptor);
}

export function parseEdc(xmlText: string): EdcDocument {
  return readEdcDocument(parseXmlTree(xmlText));
}
