/**
 * File System Utilities
 * File discovery and reading for the check command
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

export const PYTHON_EXTENSION = ".py";

/**
 * Read a file with automatic encoding detection
 * Defaults to UTF-8
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  return fsPromises.readFile(filePath, { encoding });
}

/**
 * Find files matching glob patterns
 *
 * @param options - Glob options
 * @returns Matching file paths, sorted
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: ["**/node_modules/**", "**/.git/**", ...ignore],
    dot: false, // Don't include dotfiles
  });
  return files.sort();
}

/**
 * Expands check arguments to files. Directories become every `.py` file below
 * them; glob patterns are matched; anything else is passed through as given,
 * so that missing or non-Python paths can be reported by the caller.
 */
export async function expandFileArguments(
  args: string[],
  options: { ignore?: string[]; cwd?: string } = {}
): Promise<string[]> {
  const { ignore = [], cwd = process.cwd() } = options;
  const files: string[] = [];

  for (const arg of args) {
    const resolved = path.resolve(cwd, arg);
    if (isDirectorySync(resolved)) {
      const pattern = `${fg.convertPathToPattern(arg.replace(/[\\/]+$/, ""))}/**/*${PYTHON_EXTENSION}`;
      files.push(...(await findFiles({ patterns: [pattern], ignore, cwd })));
    } else if (!fs.existsSync(resolved) && fg.isDynamicPattern(arg)) {
      files.push(...(await findFiles({ patterns: [arg], ignore, cwd })));
    } else {
      files.push(arg);
    }
  }

  return [...new Set(files)];
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function isDirectorySync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether a path names a Python source
 */
export function isPythonFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === PYTHON_EXTENSION;
}
