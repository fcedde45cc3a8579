/**
 * Splits pasted text into file paths: one per line, trimmed, surrounding quotes
 * removed (as left by "Copy as path"), blanks and repeats dropped
 */
export function parsePathList(text: string): string[] {
  const paths = text
    .split(/\r?\n/)
    .map((line) => line.trim().replace(/^"(.*)"$/, '$1').replace(/^'(.*)'$/, '$1').trim())
    .filter(Boolean);
  return [...new Set(paths)];
}

/**
 * Last segment of a POSIX or Windows path
 */
export function baseName(filePath: string): string {
  const parts = filePath.split(/[\\/]/);
  return parts[parts.length - 1] ?? filePath;
}
