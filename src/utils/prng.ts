const DEFAULT_STATE = 0x6d2b79f5;
const UINT32_RANGE = 0x1_0000_0000;

export class XorShift32 {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
    if (this.state === 0) {
      this.state = DEFAULT_STATE;
    }
  }

  nextUint32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Uniform sample in [0, 1). */
  nextFloat(): number {
    return this.nextUint32() / UINT32_RANGE;
  }

  nextInt(minInclusive: number, maxInclusive: number): number {
    if (maxInclusive < minInclusive) {
      throw new Error('invalid range');
    }

    const span = maxInclusive - minInclusive + 1;
    return minInclusive + (this.nextUint32() % span);
  }
}

/**
 * Mixes a base seed with string labels (FNV-1a) so that every link gets its
 * own stream. The same inputs always yield the same seed.
 */
export function deriveSeed(baseSeed: number, ...labels: string[]): number {
  let hash = (0x811c9dc5 ^ (baseSeed >>> 0)) >>> 0;
  for (const label of labels) {
    for (let i = 0; i < label.length; i += 1) {
      hash ^= label.charCodeAt(i);
      hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    // separator so ('ab', 'c') and ('a', 'bc') differ
    hash ^= 0xff;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }

  return hash;
}
