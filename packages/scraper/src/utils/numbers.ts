/**
 * Parses a Swedish formatted number: decimal comma, space or dot thousands
 * separators, optional percent sign. "4,41" -> 4.41, "1 234,5 %" -> 1234.5
 */
export function parseSwedishNumber(raw: string): number {
  const cleaned = raw
    .replace(/[%\s ]/g, "")
    .replace(/\.(?=\d{3}(\D|$))/g, "")
    .replace(",", ".");

  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    throw new Error(`Cannot parse Swedish number: "${raw}"`);
  }
  return Number(cleaned);
}

export function toInteger(value: number): number {
  return Math.trunc(value);
}
