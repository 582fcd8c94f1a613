/**
 * Turn a free-text `Labels:` value into Jira labels.
 *
 * Comma-separated when the text has a comma, otherwise whitespace-separated.
 * Jira labels cannot contain spaces, so inner whitespace becomes a hyphen
 * and anything but letters, digits, `_` and `-` is removed.
 *
 * `"Front End, urgent!"` → `["Front-End", "urgent"]`
 */
export function parseLabels(text: string | null | undefined): string[] {
  if (!text) {
    return [];
  }

  const parts = text.includes(',') ? text.split(',') : text.trim().split(/\s+/);

  const labels: string[] = [];
  for (const part of parts) {
    const cleaned = part
      .trim()
      .replace(/\s+/g, '-')
      .replace(/[^\p{L}\p{N}_-]/gu, '')
      .replace(/-+/g, '-')
      .replace(/^-+|-+$/g, '');
    if (cleaned) {
      labels.push(cleaned);
    }
  }
  return labels;
}
