/**
 * Seeded PRNG (xorshift128+) for reproducible fixtures and probes.
 */

export class SeededRng {
  private _s0: number;
  private _s1: number;

  constructor(seed = 42) {
    this._s0 = seed;
    this._s1 = seed ^ 0xdeadbeef;
    // Warm up
    for (let i = 0; i < 20; i++) this.next();
  }

  /** Returns a number in [0, 1). */
  next(): number {
    let s1 = this._s0;
    const s0 = this._s1;
    this._s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this._s1 = s1;
    return ((this._s0 + this._s1) >>> 0) / 0x100000000;
  }

  /** Integer in [0, n). */
  nextInt(n: number): number {
    return Math.floor(this.next() * n);
  }

  /**
   * A random point on the probability simplex. Raising uniforms to
   * `sharpness` concentrates mass on a few entries, like a model's softmax.
   */
  nextSimplex(size: number, sharpness = 1): Float64Array {
    const out = new Float64Array(size);
    let total = 0;
    for (let i = 0; i < size; i++) {
      const u = Math.pow(this.next(), sharpness) + 1e-12;
      out[i] = u;
      total += u;
    }
    for (let i = 0; i < size; i++) out[i] /= total;
    return out;
  }
}
