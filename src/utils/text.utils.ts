/**
 * Non-empty lines of command output
 */
export function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => line.length > 0);
}

/**
 * Number of lines in file content; a final line without a newline still counts
 */
export function countLines(content: string): number {
  if (content.length === 0) {
    return 0;
  }
  let count = 0;
  for (const char of content) {
    if (char === '\n') {
      count++;
    }
  }
  return content.endsWith('\n') ? count : count + 1;
}
