// engine/scanner/source-reader.ts — Input path validation and file loading

import * as fs from 'fs';

export type InvalidPathReason = 'missing' | 'not-a-file';

/**
 * Thrown before any parsing when the input path cannot be analyzed.
 */
export class InvalidPathError extends Error {
  readonly path: string;
  readonly reason: InvalidPathReason;

  constructor(filePath: string, reason: InvalidPathReason) {
    super(
      reason === 'missing'
        ? `Path '${filePath}' does not exist.`
        : `Path '${filePath}' is not a regular file.`,
    );
    this.name = 'InvalidPathError';
    this.path = filePath;
    this.reason = reason;
  }
}

/**
 * Read a whole source file as UTF-8.
 *
 * @throws {InvalidPathError} if the path is missing or is not a regular file
 */
export function readSourceFile(filePath: string): string {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat) throw new InvalidPathError(filePath, 'missing');
  if (!stat.isFile()) throw new InvalidPathError(filePath, 'not-a-file');

  return fs.readFileSync(filePath, 'utf-8');
}
