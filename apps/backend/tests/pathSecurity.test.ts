import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { getSafeExtension, validatePathWithinDirectory } from '../src/utils/pathSecurity.js';

describe('getSafeExtension', () => {
  it('keeps short alphanumeric extensions, lower-cased', () => {
    expect(getSafeExtension('Report.PDF')).toBe('.pdf');
    expect(getSafeExtension('archive.tar.gz')).toBe('.gz');
    expect(getSafeExtension('C:\\temp\\pic.JPG')).toBe('.jpg');
  });

  it('drops anything else', () => {
    expect(getSafeExtension('')).toBe('');
    expect(getSafeExtension('README')).toBe('');
    expect(getSafeExtension('trailing.')).toBe('');
    expect(getSafeExtension('weird.ex t')).toBe('');
    expect(getSafeExtension('name.abcdefghijklmnopq')).toBe('');
    expect(getSafeExtension('../../etc/passwd')).toBe('');
  });
});

describe('validatePathWithinDirectory', () => {
  const base = path.resolve('/srv/scratch');

  it('resolves names inside the directory', () => {
    expect(validatePathWithinDirectory('abc.txt', base)).toBe(path.join(base, 'abc.txt'));
    expect(validatePathWithinDirectory(path.join(base, 'abc.txt'), base)).toBe(path.join(base, 'abc.txt'));
  });

  it('rejects paths that escape the directory', () => {
    expect(() => validatePathWithinDirectory('../abc.txt', base)).toThrow(/Path traversal detected/);
    expect(() => validatePathWithinDirectory(path.resolve('/etc/passwd'), base)).toThrow(/Path traversal detected/);
  });

  it('rejects the directory itself and empty input', () => {
    expect(() => validatePathWithinDirectory('.', base)).toThrow(/Path traversal detected/);
    expect(() => validatePathWithinDirectory('', base)).toThrow('Invalid file path: must be a non-empty string');
  });
});
