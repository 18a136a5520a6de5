/**
 * "Q" encoding from RFC 2047 section 4.2
 *
 * A variant of quoted-printable used inside encoded words: `_` stands for
 * a space, `=XX` for an arbitrary byte, and everything else must be
 * printable ASCII.
 */

/**
 * Decodes Q-encoded text to a Buffer
 *
 * @param encoded - Text between the second and third `?` of an encoded word
 * @returns Decoded bytes, or `null` on an invalid escape or character
 */
export function qDecode(encoded: string): Buffer | null {
  const bytes: number[] = [];
  let i = 0;

  while (i < encoded.length) {
    const code = encoded.charCodeAt(i);

    if (code === 0x5f) {
      // '_'
      bytes.push(0x20);
      i++;
    } else if (code === 0x3d) {
      // '=' must introduce two hex digits
      const hex = encoded.substring(i + 1, i + 3);
      if (!/^[0-9A-Fa-f]{2}$/.test(hex)) {
        return null;
      }
      bytes.push(parseInt(hex, 16));
      i += 3;
    } else if ((code >= 0x20 && code <= 0x7e) || code === 0x0a || code === 0x0d || code === 0x09) {
      bytes.push(code);
      i++;
    } else {
      return null;
    }
  }

  return Buffer.from(bytes);
}
