export interface ToolSpec {
  command: string;
  args: string[];
}

export interface ToolInvocation {
  program: string;
  args: readonly string[];
  // Created or truncated before the program starts.
  stdoutPath?: string;
  stderrPath?: string;
  cwd?: string;
  env?: Record<string, string>;
  // 0 or absent: wait indefinitely.
  timeoutMs?: number;
}

export interface ToolInvocationResult {
  program: string;
  args: readonly string[];
  exitCode: 0;
  stdoutPath: string | null;
  stderrPath: string | null;
  startedAt: string;
  finishedAt: string;
}

/**
 * Runs one external program to completion. Rejects with ToolInvocationError on
 * any outcome other than exit status 0.
 */
export interface ToolInvoker {
  run(invocation: ToolInvocation): Promise<ToolInvocationResult>;
}
