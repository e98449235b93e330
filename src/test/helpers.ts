import { ConversionError, ConversionErrorCode } from "../errors";
import { OutputChannel } from "../log";

export class CapturedOutput implements OutputChannel {
  readonly lines: string[] = [];

  appendLine(value: string): void {
    this.lines.push(value);
  }
}

/** Returns the code of the ConversionError thrown by `fn`, or undefined when it does not throw. */
export function errorCodeOf(fn: () => unknown): ConversionErrorCode | "other" | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof ConversionError ? err.code : "other";
  }
  return undefined;
}

export interface SfrOptions {
  name: string;
  addr: string;
  mclr?: string;
  cname?: string;
  portals?: string;
  extra?: string;
  mode?: string;
}

export function sfrDef(options: SfrOptions): string {
  const attrs = [
    `edc:cname="${options.cname ?? options.name}"`,
    `edc:name="${options.name}"`,
    `edc:_addr="${options.addr}"`,
    `edc:mclr="${options.mclr ?? "00000000000000000000000000000000"}"`,
  ];
  if (options.portals !== undefined) {
    attrs.push(`edc:portals="${options.portals}"`);
  }
  if (options.extra) {
    attrs.push(options.extra);
  }
  const mode = options.mode === undefined ? "" : `<edc:SFRModeList><edc:SFRMode edc:id="DS.0">${options.mode}</edc:SFRMode></edc:SFRModeList>`;
  return `<edc:SFRDef ${attrs.join(" ")}>${mode}</edc:SFRDef>`;
}

export function edcDocument(name: string, sectors: Array<{ regionId?: string; body: string }>): string {
  const sectorXml = sectors
    .map((sector) => {
      const region = sector.regionId === undefined ? "" : ` edc:regionid="${sector.regionId}"`;
      return `<edc:SFRDataSector${region}>${sector.body}</edc:SFRDataSector>`;
    })
    .join("\n");
  return `<?xml version="1.0" encoding="UTF-8"?>
<edc:PIC xmlns:edc="http://crownking/edc" edc:name="${name}" edc:arch="32xxxx">
  <edc:PhysicalSpace>
${sectorXml}
  </edc:PhysicalSpace>
</edc:PIC>`;
}
