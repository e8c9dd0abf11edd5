import path from 'node:path';

/**
 * Extract the extension of a client-supplied filename, lower-cased, with the
 * leading dot. Anything that is not a short alphanumeric suffix is dropped.
 */
export function getSafeExtension(filename: string): string {
  if (!filename) return '';

  const base = path.basename(filename.replace(/\\/g, '/'));
  const ext = path.extname(base).toLowerCase();
  if (!/^\.[a-z0-9]{1,16}$/.test(ext)) return '';
  return ext;
}

/**
 * Validate that a file path is within the allowed directory.
 *
 * @returns Resolved absolute path if valid, throws error if invalid
 */
export function validatePathWithinDirectory(filePath: string, baseDir: string): string {
  if (!filePath) {
    throw new Error('Invalid file path: must be a non-empty string');
  }

  const resolvedBaseDir = path.resolve(baseDir);
  const resolvedFilePath = path.resolve(resolvedBaseDir, filePath);

  const relativePath = path.relative(resolvedBaseDir, resolvedFilePath);
  if (!relativePath || relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new Error(`Path traversal detected: ${filePath} resolves outside allowed directory ${baseDir}`);
  }

  return resolvedFilePath;
}
