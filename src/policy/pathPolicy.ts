import { promises as fs } from "fs";
import path from "path";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { isErrnoException } from "../core/errors.js";

// Realpath of the deepest existing ancestor, with the missing tail re-appended.
async function realpathLenient(target: string): Promise<string> {
  const missing: string[] = [];
  let current = path.resolve(target);
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return missing.length ? path.join(real, ...missing.reverse()) : real;
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
      const parent = path.dirname(current);
      if (parent === current) return path.resolve(target);
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Gate for caller-supplied paths at the gateway. A path is accepted when its
 * real location sits under one of the configured prefixes; outputs that do not
 * exist yet are judged by their nearest existing parent.
 */
export class PathPolicy {
  constructor(private readonly prefixes: readonly string[]) {}

  async assertAllowed(candidate: string, context: string): Promise<string> {
    const real = await realpathLenient(candidate);
    const allowed = await Promise.all(
      this.prefixes.map(async (prefix) => {
        const realPrefix = await realpathLenient(prefix);
        return real === realPrefix || real.startsWith(realPrefix + path.sep);
      })
    );
    if (!allowed.some(Boolean)) {
      throw new McpError(ErrorCode.InvalidRequest, `policy denied ${context} outside allowlist: ${real}`);
    }
    return real;
  }

  async assertAllowedOptional(candidate: string | undefined, context: string): Promise<string | undefined> {
    return candidate === undefined ? undefined : this.assertAllowed(candidate, context);
  }
}
