/** Pair of integers the service rotates roughly every hour. The first one is the hour since the Unix epoch. */
export type TokenSeed = readonly [number, number];

/** Derives the `tk` request parameter from the seed and the text being translated. */
export type TokenFunction = (seed: TokenSeed, text: string) => string;

/** Apply a shift-xor programme made of 3-character instructions, eg `+-a`. */
function shiftXor(value: number, programme: string): number {
  let a = value;

  for (let i = 0; i < programme.length - 2; i += 3) {
    const char = programme.charAt(i + 2);
    const amount = char >= 'a' ? char.charCodeAt(0) - 87 : Number(char);
    const shifted = programme.charAt(i + 1) === '+' ? a >>> amount : a << amount;
    a = programme.charAt(i) === '+' ? (a + shifted) & 4294967295 : a ^ shifted;
  }

  return a;
}

/**
 * UTF-8 bytes of the UTF-16 code units. Unlike `TextEncoder`, a lone surrogate
 * is encoded as-is instead of being replaced.
 */
function utf8Bytes(text: string): number[] {
  const bytes: number[] = [];

  for (let i = 0; i < text.length; i++) {
    let code = text.charCodeAt(i);

    if (code < 0x80) {
      bytes.push(code);
      continue;
    }

    if (code < 0x800) {
      bytes.push((code >> 6) | 0xc0);
    } else {
      const next = text.charCodeAt(i + 1);

      if ((code & 0xfc00) === 0xd800 && (next & 0xfc00) === 0xdc00) {
        code = 0x10000 + ((code & 0x3ff) << 10) + (next & 0x3ff);
        i++;
        bytes.push((code >> 18) | 0xf0, ((code >> 12) & 0x3f) | 0x80);
      } else {
        bytes.push((code >> 12) | 0xe0);
      }

      bytes.push(((code >> 6) & 0x3f) | 0x80);
    }

    bytes.push((code & 0x3f) | 0x80);
  }

  return bytes;
}

/** The checksum the web client computes for the `tk` parameter. */
export const tokenFunction: TokenFunction = ([first, second], text) => {
  let a = first;

  for (const byte of utf8Bytes(text)) {
    a = shiftXor(a + byte, '+-a^+6');
  }

  a = shiftXor(a, '+-3^+b+-f');
  a ^= second;

  if (a < 0) {
    a = (a & 2147483647) + 2147483648;
  }

  a %= 1e6;

  return `${a}.${a ^ first}`;
};
