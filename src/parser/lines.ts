/**
 * Line splitting shared by the script parsers.
 */

/**
 * Split text into lines, accepting both LF and CRLF endings
 */
export function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, '\n').split('\n');
}
