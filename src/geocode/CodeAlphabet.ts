/**
 * CodeAlphabet - integer ↔ string codec for curve indices.
 *
 * Each character carries `bitsPerChar` bits, most significant character first.
 */

import { CodeAlphabets, isBitsPerChar, type BitsPerChar } from './GeocodeConstants';
import { OutOfRangeError, InvalidArgumentError } from './GeocodeErrors';

const charLookups = new Map<BitsPerChar, ReadonlyMap<string, bigint>>();

function getCharLookup(bitsPerChar: BitsPerChar): ReadonlyMap<string, bigint> {
  let lookup = charLookups.get(bitsPerChar);
  if (!lookup) {
    const entries = Array.from(CodeAlphabets[bitsPerChar], (char, i): [string, bigint] => [char, BigInt(i)]);
    // Hex codes decode case-insensitively
    if (bitsPerChar === 4) {
      for (const [char, value] of [...entries]) {
        entries.push([char.toUpperCase(), value]);
      }
    }
    lookup = new Map(entries);
    charLookups.set(bitsPerChar, lookup);
  }
  return lookup;
}

/**
 * Throw unless bitsPerChar is one of 2, 4, 6.
 */
export function assertBitsPerChar(bitsPerChar: number): asserts bitsPerChar is BitsPerChar {
  if (!isBitsPerChar(bitsPerChar)) {
    throw new InvalidArgumentError(`bitsPerChar must be one of 2, 4, 6; got ${bitsPerChar}`);
  }
}

/**
 * Encode a non-negative integer as the shortest string over the alphabet.
 *
 * Zero encodes as the empty string; callers pad to their precision.
 */
export function encodeInt(value: bigint, bitsPerChar: number): string {
  assertBitsPerChar(bitsPerChar);
  if (value < 0n) {
    throw new OutOfRangeError(`Only non-negative integers can be encoded; got ${value}`);
  }

  const alphabet = CodeAlphabets[bitsPerChar];
  const shift = BigInt(bitsPerChar);
  const mask = (1n << shift) - 1n;

  const chars: string[] = [];
  let rest = value;
  while (rest > 0n) {
    chars.push(alphabet[Number(rest & mask)]);
    rest >>= shift;
  }

  return chars.reverse().join('');
}

/**
 * Decode a string over the alphabet back into its integer.
 */
export function decodeInt(code: string, bitsPerChar: number): bigint {
  assertBitsPerChar(bitsPerChar);

  const lookup = getCharLookup(bitsPerChar);
  const shift = BigInt(bitsPerChar);

  let value = 0n;
  for (let i = 0; i < code.length; i++) {
    const digit = lookup.get(code[i]);
    if (digit === undefined) {
      throw new InvalidArgumentError(
        `Character '${code[i]}' at position ${i} is not in the ${bitsPerChar}-bit code alphabet`
      );
    }
    value = (value << shift) | digit;
  }

  return value;
}
