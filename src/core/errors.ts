/**
 * A shared precondition of a batch is unusable (bad settings, unwritable output
 * directory, unreadable source alignment). Aborts the batch before any item runs.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export interface ToolInvocationFailure {
  program: string;
  args: readonly string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  stderrTail: string;
}

/**
 * An external program exited non-zero, was killed, or never started.
 * Recovered at the unit boundary.
 */
export class ToolInvocationError extends Error {
  readonly program: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly timedOut: boolean;
  readonly stderrTail: string;

  constructor(failure: ToolInvocationFailure, options?: { cause?: unknown }) {
    super(describeFailure(failure, options?.cause), options);
    this.name = "ToolInvocationError";
    this.program = failure.program;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.signal = failure.signal;
    this.timedOut = failure.timedOut;
    this.stderrTail = failure.stderrTail;
  }
}

function describeFailure(failure: ToolInvocationFailure, cause: unknown): string {
  const command = [failure.program, ...failure.args].join(" ");
  if (failure.timedOut) return `${failure.program} timed out: ${command}`;
  if (cause instanceof Error) return `${failure.program} failed to start (${cause.message}): ${command}`;
  if (failure.signal) return `${failure.program} killed by ${failure.signal}: ${command}`;
  return `${failure.program} failed (exit ${failure.exitCode ?? "unknown"}): ${command}`;
}

export class SequenceFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequenceFormatError";
  }
}

export class TreeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TreeFormatError";
  }
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  return String(value);
}
