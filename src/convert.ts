import * as fs from "fs";
import { ConverterSettings, DEFAULT_SETTINGS } from "./config";
import { parseEdc } from "./edc";
import { ConversionError } from "./errors";
import { ConversionLog, OutputChannel, silentOutput } from "./log";
import { collectPeripheralRegisters, groupPeripherals } from "./peripherals";
import { SvdDocumentBuilder, SvdOutDevice, renderSvd } from "./svdDocument";

export interface ConversionResult {
  device: SvdOutDevice;
  xml: string;
  warnings: string[];
}

export function convertEdc(
  edcText: string,
  settings: Readonly<ConverterSettings> = DEFAULT_SETTINGS,
  output: OutputChannel = silentOutput
): ConversionResult {
  const log = new ConversionLog(output, settings.verbose);
  const document = parseEdc(edcText);
  const builder = new SvdDocumentBuilder(document.name);
  groupPeripherals(collectPeripheralRegisters(document, settings.regionPrefix), builder, log, {
    segmentMask: settings.segmentMask,
    strictFieldWidth: settings.strictFieldWidth,
  });
  return { device: builder.device, xml: renderSvd(builder.device), warnings: log.warnings };
}

function describeIoError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function convertEdcFile(
  inputPath: string,
  outputPath: string,
  settings: Readonly<ConverterSettings> = DEFAULT_SETTINGS,
  output: OutputChannel = silentOutput
): ConversionResult {
  let edcText: string;
  try {
    edcText = fs.readFileSync(inputPath, "utf8");
  } catch (err) {
    throw new ConversionError("FileAccess", `cannot open file ${inputPath}: ${describeIoError(err)}`);
  }
  const result = convertEdc(edcText, settings, output);
  try {
    fs.writeFileSync(outputPath, result.xml, "utf8");
  } catch (err) {
    throw new ConversionError("FileAccess", `cannot write file ${outputPath}: ${describeIoError(err)}`);
  }
  return result;
}
