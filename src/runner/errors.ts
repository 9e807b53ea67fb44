// src/runner/errors.ts

/** Raised when an example's child process exits non-zero; halts the run. */
export class ExampleFailedError extends Error {
  readonly example: string;
  readonly command: string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(args: {
    example: string;
    command: string[];
    exitCode: number;
    stdout: string;
    stderr: string;
  }) {
    const code = args.exitCode.toString();
    super(`example "${args.example}" returned non-zero exit status ${code}`);
    this.name = 'ExampleFailedError';
    this.example = args.example;
    this.command = args.command;
    this.exitCode = args.exitCode;
    this.stdout = args.stdout;
    this.stderr = args.stderr;
  }
}

/** Invalid or unreadable configuration file. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
