/**
 * Output Port
 *
 * Where command results go. `line` carries machine-readable output (one
 * component id per line); `diagnostic` carries messages for humans.
 * The CLI writes to stdout/stderr; tests capture both.
 */

export interface OutputPort {
  line(text: string): void;
  diagnostic(text: string): void;
}

export const consoleOutput: OutputPort = {
  line(text: string): void {
    process.stdout.write(`${text}\n`);
  },
  diagnostic(text: string): void {
    process.stderr.write(`${text}\n`);
  }
};

export interface CapturedOutput extends OutputPort {
  lines: string[];
  diagnostics: string[];
}

export function createCapturedOutput(): CapturedOutput {
  const lines: string[] = [];
  const diagnostics: string[] = [];
  return {
    lines,
    diagnostics,
    line(text: string): void {
      lines.push(text);
    },
    diagnostic(text: string): void {
      diagnostics.push(text);
    }
  };
}
