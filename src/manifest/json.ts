import { readFile, stat } from 'node:fs/promises';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a string field from a JSON manifest, null if absent or unreadable.
 */
export async function readJsonField(path: string, field: string): Promise<string | null> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf8'));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null) return null;

  const value: unknown = Reflect.get(parsed, field);
  return typeof value === 'string' ? value : null;
}

/** Index just past the string literal opening at `start`. */
function stringEnd(content: string, start: number): number {
  let i = start + 1;
  while (i < content.length) {
    const ch = content.charAt(i);
    if (ch === '\\') {
      i += 2;
    } else if (ch === '"') {
      return i + 1;
    } else {
      i++;
    }
  }
  return content.length;
}

/**
 * Locate the string value of the root object's "version" key.
 * Nested objects, string contents and JSONC comments are skipped.
 */
function topLevelVersionRange(content: string): { start: number; end: number } | null {
  let depth = 0;
  let i = 0;
  while (i < content.length) {
    const ch = content.charAt(i);
    const next = content.charAt(i + 1);

    if (ch === '"') {
      const end = stringEnd(content, i);
      if (depth === 1 && content.slice(i, end) === '"version"') {
        const value = /^\s*:\s*"/.exec(content.slice(end));
        if (value) {
          const start = end + value[0].length - 1;
          return { start, end: stringEnd(content, start) };
        }
      }
      i = end;
    } else if (ch === '/' && next === '/') {
      const newline = content.indexOf('\n', i);
      i = newline === -1 ? content.length : newline;
    } else if (ch === '/' && next === '*') {
      const close = content.indexOf('*/', i + 2);
      i = close === -1 ? content.length : close + 2;
    } else {
      if (ch === '{' || ch === '[') depth++;
      if (ch === '}' || ch === ']') depth--;
      i++;
    }
  }
  return null;
}

/**
 * Replace the top-level "version" value, preserving formatting.
 * Falls back to re-serializing when there is no version field yet.
 */
export function replaceJsonVersion(content: string, version: string): string {
  const range = topLevelVersionRange(content);
  if (range) {
    return content.slice(0, range.start) + JSON.stringify(version) + content.slice(range.end);
  }

  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Manifest is not a JSON object');
  }
  return JSON.stringify({ ...parsed, version }, null, 2) + '\n';
}
