import { createHash, randomInt } from "crypto";

/** Uniform integers in [0, bound). */
export interface RandomSource {
  nextInt(bound: number): number;
}

const UINT32_RANGE = 0x1_0000_0000;

function assertBound(bound: number): void {
  if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
    throw new RangeError(`bound must be an integer in [1, 2^32], got ${bound}`);
  }
}

export function seedFrom(parts: string[]): Buffer {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  return h.digest();
}

/**
 * Reproducible stream: SHA-256 over (seed, block counter), consumed 32 bits at
 * a time. Bounded draws use rejection sampling so every outcome is equally likely.
 */
export class SeededRandom implements RandomSource {
  private readonly seed: Buffer;
  private counter = 0;
  private block: Buffer = Buffer.alloc(0);
  private offset = 0;

  constructor(seed: string | Buffer) {
    this.seed = typeof seed === "string" ? seedFrom([seed]) : Buffer.from(seed);
  }

  nextUint32(): number {
    if (this.offset + 4 > this.block.byteLength) {
      const counter = Buffer.alloc(8);
      counter.writeBigUInt64BE(BigInt(this.counter++));
      this.block = createHash("sha256").update(this.seed).update(counter).digest();
      this.offset = 0;
    }
    const n = this.block.readUInt32BE(this.offset);
    this.offset += 4;
    return n;
  }

  nextInt(bound: number): number {
    assertBound(bound);
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (;;) {
      const n = this.nextUint32();
      if (n < limit) return n % bound;
    }
  }
}

export const systemRandom: RandomSource = {
  nextInt(bound: number): number {
    assertBound(bound);
    return randomInt(bound);
  }
};

/**
 * Independent stream for one replicate. Without a seed every replicate draws
 * from the platform CSPRNG.
 */
export function replicateRandom(seed: string | null, replicateIndex: number): RandomSource {
  if (seed === null) return systemRandom;
  return new SeededRandom(seedFrom([seed, `replicate=${replicateIndex}`]));
}
