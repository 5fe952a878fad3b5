import { ToolInvocationError } from "../core/errors.js";
import type { Logger } from "../logging/logger.js";

export type StageResult<T> = { ok: true; value: T } | { ok: false; error: ToolInvocationError };

/**
 * Runs one stage and turns a tool failure into a value. Anything else still
 * throws and is handled by the batch driver.
 */
export async function runStage<T>(stage: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return { ok: true, value: await stage() };
  } catch (e) {
    if (e instanceof ToolInvocationError) return { ok: false, error: e };
    throw e;
  }
}

export function logToolFailure(logger: Logger, stage: string, error: ToolInvocationError): void {
  logger.error(
    {
      stage,
      program: error.program,
      args: error.args,
      exit_code: error.exitCode,
      signal: error.signal,
      timed_out: error.timedOut,
      stderr: error.stderrTail || undefined
    },
    error.message
  );
}
