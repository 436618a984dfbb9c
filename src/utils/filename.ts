import path from 'path';

/**
 * Sanitizes a filename for the staging area.
 *
 * Rules, applied to the name part only (the extension is kept, trimmed):
 * - surrounding whitespace is removed
 * - whitespace next to a dash becomes a double dash ("a - b" -> "a--b")
 * - any other run of whitespace becomes a single underscore
 *
 * @example
 * sanitizeStagedName(' Letter - page 1.TIF ') // 'Letter--page_1.TIF'
 */
export function sanitizeStagedName(filename: string): string {
  const trimmed = filename.trim();
  const extension = path.extname(trimmed);
  let name = trimmed.slice(0, trimmed.length - extension.length).trim();

  name = name.replace(/\s+-\s+/g, '--');
  name = name.replace(/\s+-/g, '--');
  name = name.replace(/-\s+/g, '--');
  name = name.replace(/\s+/g, '_');

  return name + extension.trim();
}

/**
 * Sanitizes a name for a generated working file (e.g. a CSV working copy).
 * Spaces and special characters become underscores; underscores around
 * dashes collapse into the dash.
 *
 * @example
 * sanitizeFilename('Spring 2024 - batch (final)') // 'Spring_2024-batch_final_'
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/ /g, '_')
    .replace(/[^\w\-.]/g, '_')
    .replace(/_*-_*/g, '-')
    .replace(/_+/g, '_');
}

/**
 * Formats a date as YYYYMMDD_HHmmss (local time).
 */
export function formatFileTimestamp(date: Date = new Date()): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Appends `_1`, `_2`, ... before the extension until `isTaken` returns false.
 */
export async function resolveNameCollision(
  filename: string,
  isTaken: (candidate: string) => Promise<boolean>
): Promise<string> {
  if (!(await isTaken(filename))) {
    return filename;
  }

  const extension = path.extname(filename);
  const base = filename.slice(0, filename.length - extension.length);
  let counter = 1;
  let candidate = `${base}_${counter}${extension}`;
  while (await isTaken(candidate)) {
    counter++;
    candidate = `${base}_${counter}${extension}`;
  }
  return candidate;
}
