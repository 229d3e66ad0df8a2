/**
 * Splits `name:argument` at the first colon. The argument is undefined when
 * there is no colon.
 */
export function splitArgument(text: string): [string, string | undefined] {
  const colon = text.indexOf(":");
  if (colon < 0) return [text, undefined];
  return [text.slice(0, colon), text.slice(colon + 1)];
}

/** Strict decimal integer; rejects "", "1.5", "1e3" and " 2". */
export function parseInteger(text: string): number | undefined {
  if (!/^-?\d+$/.test(text)) return undefined;
  return parseInt(text, 10);
}
