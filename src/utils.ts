import { ValidationError } from "./errors";

// Safe UTF-8 (supports emoji/accents), used for image payloads
export function stringToBytes(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

export function bytesToString(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

/**
 * One byte per character, as the zero-width codec carries it.
 * Characters above U+00FF cannot be represented and are rejected.
 */
export function singleByteToBytes(str: string): Uint8Array {
  const out = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i);
    if (code > 0xff) {
      throw new ValidationError(`character at index ${i} (U+${code.toString(16).toUpperCase().padStart(4, "0")}) does not fit in one byte`, {
        index: i,
        codePoint: code,
      });
    }
    out[i] = code;
  }
  return out;
}

export function bytesToSingleByte(bytes: Uint8Array): string {
  let s = "";
  for (const b of bytes) s += String.fromCharCode(b);
  return s;
}

export function toBits(bytes: Uint8Array): number[] {
  const bits: number[] = [];
  for (const b of bytes) {
    for (let i = 7; i >= 0; i--) bits.push((b >> i) & 1);
  }
  return bits;
}

export function fromBits(bits: readonly number[]): Uint8Array {
  const out = new Uint8Array(Math.floor(bits.length / 8));
  for (let i = 0; i + 8 <= bits.length; i += 8) {
    let b = 0;
    for (let k = 0; k < 8; k++) b = (b << 1) | (bits[i + k]! & 1);
    out[i / 8] = b;
  }
  return out;
}

export function posMod(a: number, m: number): number {
  return ((a % m) + m) % m;
}

// Simple and deterministic PRNG for shuffling (mulberry32)
export function mulberry32(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makePermutation(n: number, seed?: number): number[] {
  const arr = Array.from({ length: n }, (_, i) => i);
  if (seed == null) return arr;
  const rnd = mulberry32(seed >>> 0);
  // Fisher-Yates
  for (let i = n - 1; i > 0; i--) {
    const j = Math.floor(rnd() * (i + 1));
    [arr[i], arr[j]] = [arr[j]!, arr[i]!];
  }
  return arr;
}

export function clampByte(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v)));
}
