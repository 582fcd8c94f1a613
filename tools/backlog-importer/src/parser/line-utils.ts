/**
 * Return the value after a `Field:` prefix, trimmed.
 */
export function fieldValue(line: string, prefix: string): string {
  return line.slice(prefix.length).trim();
}

/**
 * Trim every line and drop blank ones. Blank lines never change parser state.
 */
export function contentLines(lines: readonly string[]): string[] {
  const result: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed) {
      result.push(trimmed);
    }
  }
  return result;
}
