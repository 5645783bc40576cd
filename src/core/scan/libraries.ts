/**
 * Sources of library names to scan.
 */
import { builtinModules } from 'node:module';
import { readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, errorMessage } from '../../utils/errors.js';

/**
 * Parse a newline-delimited library list. Lines are trimmed; blank lines and
 * `#` comments are dropped.
 */
export function parseLibraryList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function readLibraryList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(ErrorCodes.FILE_READ, `Cannot read library list: ${filePath}`, {
      filePath,
      error: errorMessage(error),
    });
  }
  return parseLibraryList(content);
}

/**
 * Public Node.js built-in modules, without the `_`-prefixed internals.
 */
export function builtinLibraryNames(): string[] {
  return builtinModules
    .filter((name) => !name.startsWith('_') && !name.startsWith('node:'))
    .sort();
}
