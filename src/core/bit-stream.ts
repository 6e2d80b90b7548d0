import { OutOfDataError } from '../errors.js';

/**
 * A single binary decision.
 */
export type Bit = 0 | 1;

/**
 * Bit-level output stream.
 * Packs bits LSB-first: the first bit written lands in bit 0 of the byte.
 */
export class BitOutputStream {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit to the stream.
   * @param bit - 0 or 1
   */
  writeBit(bit: Bit): void {
    this.currentByte |= (bit & 1) << this.bitPosition;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write the low `count` bits of a number (LSB first).
   * @param value - The value containing the bits
   * @param count - Number of bits to write (0-32)
   */
  writeBits(value: number, count: number): void {
    for (let i = 0; i < count; i++) {
      this.writeBit((value >>> i) & 1 ? 1 : 0);
    }
  }

  /**
   * Commit any partial byte (unused high bits stay zero) and return
   * everything written so far.
   */
  flush(): Uint8Array {
    if (this.bitPosition > 0) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
    return this.toUint8Array();
  }

  /**
   * Get the committed byte count (before flush).
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  /**
   * Get the total bit count written.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Copy of the committed bytes.
   * Call flush() first if you want to include partial bytes.
   */
  toUint8Array(): Uint8Array {
    return new Uint8Array(this.buffer);
  }
}

/**
 * Bit-level input stream over a fixed buffer, LSB-first within each byte.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bytePosition: number = 0;
  private bitPosition: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  /**
   * Read a single bit from the stream.
   * @throws OutOfDataError when every bit has been consumed
   */
  readBit(): Bit {
    if (this.bytePosition >= this.data.length) {
      throw new OutOfDataError(
        `BitInputStream: out of data after ${this.data.length * 8} bits`
      );
    }

    const bit = (this.data[this.bytePosition] >>> this.bitPosition) & 1;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.bytePosition++;
      this.bitPosition = 0;
    }

    return bit ? 1 : 0;
  }

  /**
   * Read `count` bits as an unsigned number (LSB first).
   * @param count - Number of bits to read (0-32)
   */
  readBits(count: number): number {
    let value = 0;
    for (let i = 0; i < count; i++) {
      if (this.readBit()) {
        value = (value | (1 << i)) >>> 0;
      }
    }
    return value;
  }

  /**
   * Check if we've reached the end of the data.
   */
  get isAtEnd(): boolean {
    return this.bytePosition >= this.data.length;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bytePosition * 8 + this.bitPosition;
  }

  /**
   * Get total size in bits.
   */
  get size(): number {
    return this.data.length * 8;
  }
}
