/** Counts code points, so a character outside the BMP counts once and not as two UTF-16 units. */
export function countCharacters(text: string): number {
  return [...text].length;
}
