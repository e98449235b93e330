export type ConversionErrorCode =
  | "MalformedNumber"
  | "UnrecognizedPortalsSpec"
  | "UnexpectedFieldEntry"
  | "NameMismatch"
  | "MissingPeripheralHint"
  | "UnknownModuleSource"
  | "AddressOrderingViolation"
  | "MissingElement"
  | "MissingAttribute"
  | "MalformedDocument"
  | "FieldWidthOverflow"
  | "FileAccess";

/** Raised for every condition that aborts a conversion. */
export class ConversionError extends Error {
  constructor(readonly code: ConversionErrorCode, message: string) {
    super(message);
    this.name = "ConversionError";
  }
}

export function isConversionError(err: unknown, code?: ConversionErrorCode): err is ConversionError {
  if (!(err instanceof ConversionError)) {
    return false;
  }
  return code === undefined || err.code === code;
}
