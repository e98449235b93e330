import * as os from "os";
import * as path from "path";
import { parseAddressLiteral } from "./attributes";

export interface ConverterSettings {
  verbose: boolean;
  /** Fail instead of warn when a register's fields span more than 32 bits. */
  strictFieldWidth: boolean;
  /** OR-ed into every physical address; the default selects the KSEG1 window. */
  segmentMask: number;
  /** Only data sectors whose region id starts with this text are converted. */
  regionPrefix: string;
}

export const DEFAULT_SETTINGS: Readonly<ConverterSettings> = {
  verbose: false,
  strictFieldWidth: false,
  segmentMask: 0xa0000000,
  regionPrefix: "periph",
};

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value.trim() === "1" || value.trim().toLowerCase() === "true";
}

export function settingsFromEnv(
  env: NodeJS.ProcessEnv,
  base: Readonly<ConverterSettings> = DEFAULT_SETTINGS
): ConverterSettings {
  const mask = env.EDC2SVD_SEGMENT_MASK?.trim();
  const prefix = env.EDC2SVD_REGION_PREFIX?.trim();
  return {
    verbose: envFlag(env.EDC2SVD_VERBOSE) ?? base.verbose,
    strictFieldWidth: envFlag(env.EDC2SVD_STRICT_FIELD_WIDTH) ?? base.strictFieldWidth,
    segmentMask: mask ? parseAddressLiteral(mask) : base.segmentMask,
    regionPrefix: prefix ? prefix : base.regionPrefix,
  };
}

export function resolvePath(input?: string, baseFolder?: string): string | undefined {
  if (!input) {
    return undefined;
  }
  let value = input.trim();
  if (!value) {
    return undefined;
  }
  if (value === "~" || value.startsWith("~/")) {
    value = path.join(os.homedir(), value.slice(1));
  }
  if (!path.isAbsolute(value)) {
    value = path.join(baseFolder ?? process.cwd(), value);
  }
  return value;
}
