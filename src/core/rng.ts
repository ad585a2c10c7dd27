/** 32-bit xorshift; the same seed always yields the same stream. */
export class XorShift32 {
  private s: number;

  constructor(seed: number) {
    // avoid zero state
    this.s = seed | 0 || 0x12345678;
  }

  nextU32(): number {
    // xorshift32
    let x = this.s | 0;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x | 0;
    return this.s >>> 0;
  }

  /**
   * Integer in [0, maxExclusive). Plain modulo: the bias is below 1e-8 for
   * small ranges such as the seven piece kinds.
   */
  nextInt(maxExclusive: number): number {
    return this.nextU32() % maxExclusive;
  }
}

/** Fresh seed for a new process; runs started at different times differ. */
export function timeSeed(now: number = Date.now()): number {
  return (now ^ (now / 0x100000000)) >>> 0;
}
