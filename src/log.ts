/** Line sink with the shape of an editor output channel. */
export interface OutputChannel {
  appendLine(value: string): void;
}

export const silentOutput: OutputChannel = {
  appendLine: () => undefined,
};

export const stdoutOutput: OutputChannel = {
  appendLine: (value: string) => {
    process.stdout.write(`${value}\n`);
  },
};

export const stderrOutput: OutputChannel = {
  appendLine: (value: string) => {
    process.stderr.write(`${value}\n`);
  },
};

/** Trace lines and warnings reach the output only when verbose; warnings are always recorded. */
export class ConversionLog {
  readonly warnings: string[] = [];

  constructor(private readonly output: OutputChannel, private readonly verbose = false) {}

  info(message: string): void {
    if (this.verbose) {
      this.output.appendLine(message);
    }
  }

  warn(message: string): void {
    this.warnings.push(message);
    if (this.verbose) {
      this.output.appendLine(`[warn] ${message}`);
    }
  }
}
