const SUCCESS_SLOT = 0;
const HEIGHT_SLOT = 1;
const SLOT_COUNT = 2;

export interface LivenessSnapshot {
  success: boolean;
  bestHeight: number;
}

/**
 * Shared success latch plus best-height-seen counter.
 *
 * Two int64 cells at the start of a SharedArrayBuffer: success (0 or 1), then
 * best height. They are only touched through Atomics, so a worker thread
 * holding the same buffer, through {@link LivenessGate.fromBuffer} or its own
 * BigInt64Array, sees and publishes the same state. `success` goes
 * false -> true at most once and `bestHeight` never decreases.
 */
export class LivenessGate {
  private readonly cells: BigInt64Array;

  constructor(
    readonly buffer: SharedArrayBuffer = new SharedArrayBuffer(SLOT_COUNT * BigInt64Array.BYTES_PER_ELEMENT)
  ) {
    if (buffer.byteLength < SLOT_COUNT * BigInt64Array.BYTES_PER_ELEMENT) {
      throw new RangeError(`liveness gate buffer too small: ${buffer.byteLength} bytes`);
    }

    this.cells = new BigInt64Array(buffer, 0, SLOT_COUNT);
  }

  static fromBuffer(buffer: SharedArrayBuffer): LivenessGate {
    return new LivenessGate(buffer);
  }

  /** Latches success. Returns true only for the call that flipped it. */
  setSuccess(): boolean {
    return Atomics.compareExchange(this.cells, SUCCESS_SLOT, 0n, 1n) === 0n;
  }

  isSuccess(): boolean {
    return Atomics.load(this.cells, SUCCESS_SLOT) === 1n;
  }

  /** Raises the best height to `height` if it is strictly greater. Returns whether it moved. */
  updateBestHeight(height: number): boolean {
    if (!Number.isSafeInteger(height) || height < 0) {
      throw new RangeError(`invalid block height: ${height}`);
    }

    const target = BigInt(height);
    let current = Atomics.load(this.cells, HEIGHT_SLOT);
    while (target > current) {
      const witnessed = Atomics.compareExchange(this.cells, HEIGHT_SLOT, current, target);
      if (witnessed === current) {
        return true;
      }
      current = witnessed;
    }

    return false;
  }

  bestHeight(): number {
    return Number(Atomics.load(this.cells, HEIGHT_SLOT));
  }

  snapshot(): LivenessSnapshot {
    return {
      success: this.isSuccess(),
      bestHeight: this.bestHeight(),
    };
  }
}
