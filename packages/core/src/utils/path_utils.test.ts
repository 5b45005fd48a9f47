import * as os from 'os';
import * as path from 'path';
import { expandHome, isFileNotFound } from './path_utils';

describe('expandHome', () => {
  it('should expand a leading tilde only', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/.ssh/id_ed25519')).toBe(path.join(os.homedir(), '.ssh/id_ed25519'));
    expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
    expect(expandHome('~alice/x')).toBe('~alice/x');
  });
});

describe('isFileNotFound', () => {
  it('should match errors by their ENOENT code', () => {
    const crossRealm = { code: 'ENOENT', message: "ENOENT: no such file or directory, open '/x'" };

    expect(isFileNotFound(crossRealm)).toBe(true);
    expect(isFileNotFound(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isFileNotFound(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
    expect(isFileNotFound(new Error('plain'))).toBe(false);
    expect(isFileNotFound(null)).toBe(false);
  });
});
