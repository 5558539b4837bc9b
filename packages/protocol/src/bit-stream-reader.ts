export const MAX_BIT_WIDTH = 32;

export const assertBitWidth = (width: number): void => {
  if (!Number.isInteger(width) || width < 1 || width > MAX_BIT_WIDTH) {
    throw new RangeError(`Bit width must be an integer in [1, ${MAX_BIT_WIDTH}], got ${width}.`);
  }
};

export const assertSkipWidth = (width: number): void => {
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`Skip width must be a non-negative integer, got ${width}.`);
  }
};

/**
 * Cursor over a byte buffer that reads unsigned integers of arbitrary bit width.
 *
 * Bits are consumed least-significant first within each byte, and a field that
 * crosses a byte boundary continues at bit 0 of the next byte. Bits past the end
 * of the buffer read as 0: a truncated packet still decodes to a complete
 * structure, and the decoder's count checks decide whether it is usable.
 */
export class BitStreamReader {
  private position: number;

  /**
   * @param buffer - bytes to read from.
   * @param startByte - 0-based byte offset of the first bit to read.
   */
  constructor(
    private readonly buffer: Uint8Array,
    startByte = 0,
  ) {
    if (!Number.isInteger(startByte) || startByte < 0) {
      throw new RangeError(`Start byte must be a non-negative integer, got ${startByte}.`);
    }
    this.position = startByte * 8;
  }

  /** Absolute bit offset of the cursor. */
  get bitPosition(): number {
    return this.position;
  }

  /** Bits left before the cursor runs past the end of the buffer. */
  get remainingBits(): number {
    return Math.max(0, this.buffer.length * 8 - this.position);
  }

  read(width: number): number {
    assertBitWidth(width);

    let result = 0;
    for (let index = 0; index < width; index += 1) {
      const byteIndex = Math.floor(this.position / 8);
      if (byteIndex < this.buffer.length) {
        const bit = (this.buffer[byteIndex] >> (this.position % 8)) & 1;
        // Multiply rather than shift: bit 31 would otherwise flip the sign.
        result += bit * 2 ** index;
      }
      this.position += 1;
    }
    return result;
  }

  skip(width: number): void {
    assertSkipWidth(width);
    this.position += width;
  }
}
