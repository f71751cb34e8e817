import { isBuiltinModule, isLibraryFile, isVerificationFile } from '../classify';

describe('file classification', () => {
  test('verification files carry the .test.py marker', () => {
    expect(isVerificationFile('/repo/tests/union_find.test.py')).toBe(true);
    expect(isVerificationFile('/repo/lib/union_find.py')).toBe(false);
  });

  test('library files are public Python sources that are not verification files', () => {
    expect(isLibraryFile('/repo/lib/union_find.py')).toBe(true);
    expect(isLibraryFile('/repo/lib/_private.py')).toBe(false);
    expect(isLibraryFile('/repo/lib/__init__.py')).toBe(false);
    expect(isLibraryFile('/repo/tests/union_find.test.py')).toBe(false);
    expect(isLibraryFile('/repo/README.md')).toBe(false);
  });

  test('builtin modules come from the interpreter list', () => {
    expect(isBuiltinModule('sys')).toBe(true);
    expect(isBuiltinModule('builtins')).toBe(true);
    expect(isBuiltinModule('union_find')).toBe(false);
  });
});
