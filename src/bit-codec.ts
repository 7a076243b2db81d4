import { bytesToSingleByte, fromBits, singleByteToBytes, toBits } from "./utils";

export const ZERO = "\u200B"; // zero width space
export const ONE = "\u200C"; // zero width non-joiner

/**
 * Hides bytes in zero-width characters, one marker per bit, MSB first.
 *
 * Holds nothing but the two marker symbols; create as many as you like.
 */
export class BitCodec {
  readonly zero: string;
  readonly one: string;

  constructor(zero: string = ZERO, one: string = ONE) {
    if ([...zero].length !== 1 || [...one].length !== 1 || zero === one) {
      throw new RangeError("BitCodec needs two distinct single-character markers");
    }
    this.zero = zero;
    this.one = one;
  }

  encode(payload: Uint8Array): string {
    let out = "";
    for (const bit of toBits(payload)) out += bit === 1 ? this.one : this.zero;
    return out;
  }

  /**
   * Anything that is not a marker is skipped, not treated as a separator.
   * A trailing group shorter than 8 bits is dropped.
   */
  decode(text: string): Uint8Array {
    const bits: number[] = [];
    for (const ch of text) {
      if (ch === this.zero) bits.push(0);
      else if (ch === this.one) bits.push(1);
    }
    return fromBits(bits);
  }

  encodeText(text: string): string {
    return this.encode(singleByteToBytes(text));
  }

  decodeText(text: string): string {
    return bytesToSingleByte(this.decode(text));
  }

  /** Removes every marker, leaving the visible text. */
  strip(text: string): string {
    let out = "";
    for (const ch of text) if (ch !== this.zero && ch !== this.one) out += ch;
    return out;
  }
}
