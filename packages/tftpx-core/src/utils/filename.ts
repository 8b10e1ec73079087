import { TftpxValidationError } from '../errors.js';

const MAX_FILENAME_LENGTH = 255;

/**
 * Accept only a bare file name: no directory components, no parent references,
 * no control characters, no surrounding whitespace. The name is never rewritten.
 * @throws {TftpxValidationError}
 */
export function validatePlainFilename(name: string): string {
  if (!name.trim()) {
    throw new TftpxValidationError('File name must not be empty.');
  }
  if (name.trim() !== name) {
    throw new TftpxValidationError('File name must not start or end with whitespace.');
  }
  if (name.length > MAX_FILENAME_LENGTH) {
    throw new TftpxValidationError(`File name is too long (max ${MAX_FILENAME_LENGTH} characters).`);
  }
  if (/[/\\]/.test(name)) {
    throw new TftpxValidationError('File name must not contain path separators.');
  }
  if (name === '.' || name === '..') {
    throw new TftpxValidationError('File name must not be a directory reference.');
  }
  if (/[\x00-\x1f]/.test(name)) {
    throw new TftpxValidationError('File name must not contain control characters.');
  }
  return name;
}
