import { spawn, type StdioOptions } from "child_process";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { ToolInvocationError } from "../../core/errors.js";
import type { ToolInvocation, ToolInvocationResult, ToolInvoker } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  spawnError: Error | null;
}

export class LocalProcessInvoker implements ToolInvoker {
  async run(invocation: ToolInvocation): Promise<ToolInvocationResult> {
    const { program, args } = invocation;
    if (!program) throw new Error("program must be non-empty");

    const handles: FileHandle[] = [];
    try {
      const stdoutFile = invocation.stdoutPath ? await fs.open(invocation.stdoutPath, "w") : null;
      if (stdoutFile) handles.push(stdoutFile);
      const stderrFile = invocation.stderrPath ? await fs.open(invocation.stderrPath, "w") : null;
      if (stderrFile) handles.push(stderrFile);

      const stdio: StdioOptions = ["ignore", stdoutFile ? stdoutFile.fd : "ignore", stderrFile ? stderrFile.fd : "pipe"];
      const startedAt = new Date().toISOString();

      const child = spawn(program, [...args], {
        cwd: invocation.cwd,
        env: { ...process.env, ...invocation.env },
        stdio
      });

      const stderrChunks: Buffer[] = [];
      const stderrState = { bytes: 0, truncated: false };
      child.stderr?.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

      let timedOut = false;
      const timeoutMs = Math.max(0, Math.floor(invocation.timeoutMs ?? 0));
      const timeout =
        timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              child.kill("SIGKILL");
            }, timeoutMs)
          : null;

      const status = await new Promise<ExitStatus>((resolve) => {
        child.once("error", (err: Error) => resolve({ code: null, signal: null, spawnError: err }));
        child.once("close", (code: number | null, signal: NodeJS.Signals | null) =>
          resolve({ code, signal, spawnError: null })
        );
      }).finally(() => {
        if (timeout) clearTimeout(timeout);
      });

      const finishedAt = new Date().toISOString();

      if (status.spawnError || timedOut || status.code !== 0) {
        const stderrTail =
          Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");
        throw new ToolInvocationError(
          { program, args, exitCode: status.code, signal: status.signal, timedOut, stderrTail },
          status.spawnError ? { cause: status.spawnError } : undefined
        );
      }

      return {
        program,
        args,
        exitCode: 0,
        stdoutPath: invocation.stdoutPath ?? null,
        stderrPath: invocation.stderrPath ?? null,
        startedAt,
        finishedAt
      };
    } finally {
      await Promise.all(handles.map((h) => h.close()));
    }
  }
}
