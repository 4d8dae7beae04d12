/**
 * 7-bit cleanliness check gating every textual field on the wire.
 */

/**
 * Tests whether every character of a string is within 0x00-0x7F
 *
 * @param text - The text to check
 * @returns true when the text can travel over a 7-bit channel unencoded
 */
export function isAscii(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0x7f) {
      return false;
    }
  }
  return true;
}
