/**
 * file-service.ts
 * Line-oriented reading of input files and whole-file report writes.
 *
 * Constraints:
 * - Relative paths resolve against baseDir; absolute paths are used as-is.
 * - Whole-file synchronous I/O: no handle outlives a call.
 * - A missing input file raises DatasetError(FileNotFound); any other I/O
 *   error propagates unchanged.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DatasetError } from './dataset-error.js';

export class FileService {
  private readonly _baseDir: string;

  constructor(baseDir: string = process.cwd()) {
    this._baseDir = path.resolve(baseDir);
  }

  /**
   * Read a text file and split it into lines.
   *
   * Lines break on `\n`, `\r\n` or a bare `\r`. A trailing newline does not add an
   * empty last line, so a zero-byte file yields `[]` and `"\n"` yields `['']`.
   */
  readLines(relOrAbsPath: string): string[] {
    const resolved = this.resolve(relOrAbsPath);
    let content: string;
    try {
      content = fs.readFileSync(resolved, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw DatasetError.fileNotFound(relOrAbsPath);
      }
      throw err;
    }
    return splitLines(content);
  }

  /**
   * Write text to a file, creating parent directories as needed and
   * overwriting any existing file.
   */
  writeText(relOrAbsPath: string, content: string): void {
    const resolved = this.resolve(relOrAbsPath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, content, 'utf-8');
  }

  resolve(relOrAbsPath: string): string {
    return path.isAbsolute(relOrAbsPath)
      ? path.normalize(relOrAbsPath)
      : path.resolve(this._baseDir, relOrAbsPath);
  }
}

export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
