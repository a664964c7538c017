/**
 * PointHasher - Deterministic coordinate hasher using FNV-1a
 *
 * Works only with primitives. Numeric kinds feed their values into it,
 * points feed their arity first so a 2D and a 3D point never share input.
 *
 * @example
 * ```typescript
 * const hash = new PointHasher()
 *   .addInt(2)
 *   .addInt(point.x)
 *   .addInt(point.y)
 *   .finalize();
 * ```
 */
export class PointHasher {
  private static readonly FNV_OFFSET = 2166136261n;
  private static readonly FNV_PRIME = 16777619n;
  private static readonly MASK_32 = 0xffffffffn;

  private hash: bigint;

  constructor() {
    this.hash = PointHasher.FNV_OFFSET;
  }

  private mix(unit: number | bigint): void {
    this.hash ^= BigInt(unit);
    this.hash = (this.hash * PointHasher.FNV_PRIME) & PointHasher.MASK_32;
  }

  /**
   * Add a 32-bit integer to the hash
   * @param value - Integer value to hash (truncated to 32 bits)
   * @returns this (for chaining)
   */
  addInt(value: number): this {
    const int = Math.trunc(value) | 0;

    this.mix(int & 0xff);
    this.mix((int >> 8) & 0xff);
    this.mix((int >> 16) & 0xff);
    this.mix((int >> 24) & 0xff);

    return this;
  }

  /**
   * Add an arbitrary-width integer to the hash
   * @returns this (for chaining)
   */
  addBigInt(value: bigint): this {
    // Sign first, then magnitude bytes little-endian
    this.mix(value < 0n ? 1 : 0);
    let magnitude = value < 0n ? -value : value;
    do {
      this.mix(magnitude & 0xffn);
      magnitude >>= 8n;
    } while (magnitude > 0n);
    return this;
  }

  /**
   * Add a float to the hash through its canonical string,
   * so `-0` and `0` hash alike
   * @returns this (for chaining)
   */
  addFloat(value: number): this {
    return this.addString(String(value));
  }

  /**
   * Add a string to the hash
   * @returns this (for chaining)
   */
  addString(value: string): this {
    for (let i = 0; i < value.length; i++) {
      this.mix(value.charCodeAt(i) & 0xffff);
    }
    // Terminator keeps ("ab", "c") apart from ("a", "bc")
    this.mix(0);
    return this;
  }

  /**
   * Finalize and get the hash as a hex string
   * @returns 8-character hex string (32-bit hash)
   */
  finalize(): string {
    return this.hash.toString(16).padStart(8, '0');
  }

  /**
   * Reset hasher to initial state (for reuse)
   * @returns this (for chaining)
   */
  reset(): this {
    this.hash = PointHasher.FNV_OFFSET;
    return this;
  }

  static create(): PointHasher {
    return new PointHasher();
  }
}
