import { assertBitWidth, assertSkipWidth } from "./bit-stream-reader";
import { fitsInBits } from "./utils/number";

/**
 * Packs unsigned integers into bytes with the same LSB-first layout
 * {@link BitStreamReader} reads.
 */
export class BitStreamWriter {
  private readonly bytes: number[] = [];
  private position = 0;

  get bitPosition(): number {
    return this.position;
  }

  write(value: number, width: number): void {
    assertBitWidth(width);
    if (!fitsInBits(value, width)) {
      throw new RangeError(`Value ${value} does not fit in ${width} bits.`);
    }

    for (let index = 0; index < width; index += 1) {
      const bit = Math.floor(value / 2 ** index) % 2;
      const byteIndex = Math.floor(this.position / 8);
      this.ensureLength(byteIndex + 1);
      if (bit === 1) {
        this.bytes[byteIndex] |= 1 << (this.position % 8);
      }
      this.position += 1;
    }
  }

  /** Advances over `width` zero bits. */
  skip(width: number): void {
    assertSkipWidth(width);
    this.position += width;
    this.ensureLength(Math.ceil(this.position / 8));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  private ensureLength(length: number): void {
    while (this.bytes.length < length) {
      this.bytes.push(0);
    }
  }
}
