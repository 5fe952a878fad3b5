import { describe, it, expect } from "vitest";
import { mkdir, mkdtemp, realpath, rm, symlink } from "fs/promises";
import os from "os";
import path from "path";
import { McpError } from "@modelcontextprotocol/sdk/types.js";
import { UsageError, assertKnownFlags, booleanFlag, intFlag, listFlag, numberFlag, parseArgs, stringFlag } from "../src/cli/args.js";
import { PathPolicy } from "../src/policy/pathPolicy.js";

describe("parseArgs", () => {
  it("reads values and switches", () => {
    const args = parseArgs(["--samples", "S1, S2,,S3", "--annotate-support", "--threshold", "0.75", "--replicates", "50"], [
      "annotate-support"
    ]);
    expect(listFlag(args, "samples")).toEqual(["S1", "S2", "S3"]);
    expect(booleanFlag(args, "annotate-support")).toBe(true);
    expect(numberFlag(args, "threshold")).toBe(0.75);
    expect(intFlag(args, "replicates")).toBe(50);
    expect(stringFlag(args, "config")).toBeUndefined();
    expect(booleanFlag(args, "help")).toBeUndefined();
  });

  it("rejects malformed command lines", () => {
    expect(() => parseArgs(["positional"])).toThrow(UsageError);
    expect(() => parseArgs(["--config"])).toThrow("missing value for --config");
    expect(() => parseArgs(["--config", "--help"])).toThrow("missing value for --config");
    expect(() => intFlag(parseArgs(["--replicates", "1.5"]), "replicates")).toThrow("invalid --replicates: 1.5");
    expect(() => numberFlag(parseArgs(["--threshold", "half"]), "threshold")).toThrow(UsageError);
    expect(() => assertKnownFlags(parseArgs(["--sead", "x"]), ["seed"])).toThrow("unknown flag: --sead");
  });
});

describe("PathPolicy", () => {
  it("accepts paths under an allowed prefix, existing or not", async () => {
    const dir = await realpath(await mkdtemp(path.join(os.tmpdir(), "ribotree-policy-")));
    try {
      const policy = new PathPolicy([dir]);
      expect(await policy.assertAllowed(dir, "dir")).toBe(dir);
      expect(await policy.assertAllowed(path.join(dir, "new", "out.csv"), "output")).toBe(path.join(dir, "new", "out.csv"));
      await expect(policy.assertAllowed(path.join(dir, "..", "sibling"), "output")).rejects.toThrow(McpError);
      await expect(policy.assertAllowed(`${dir}-other`, "output")).rejects.toThrow(McpError);
      expect(await policy.assertAllowedOptional(undefined, "output")).toBeUndefined();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("judges symlinks by where they point", async () => {
    const dir = await realpath(await mkdtemp(path.join(os.tmpdir(), "ribotree-policy-")));
    const outside = await realpath(await mkdtemp(path.join(os.tmpdir(), "ribotree-outside-")));
    try {
      await mkdir(path.join(dir, "allowed"));
      await symlink(outside, path.join(dir, "allowed", "link"));
      const policy = new PathPolicy([path.join(dir, "allowed")]);
      await expect(policy.assertAllowed(path.join(dir, "allowed", "link", "x.fasta"), "input")).rejects.toThrow(
        "policy denied input outside allowlist"
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
      await rm(outside, { recursive: true, force: true });
    }
  });

  it("denies everything with an empty allowlist", async () => {
    await expect(new PathPolicy([]).assertAllowed(os.tmpdir(), "dir")).rejects.toThrow(McpError);
  });
});
