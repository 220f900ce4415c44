import { describe, it, expect } from 'vitest';
import path from 'node:path';
import { expandPath } from './path';

describe('path', () => {
  describe('expandPath', () => {
    it('expands a bare tilde to the home directory', () => {
      expect(expandPath('~', '/cwd', '/home/me')).toBe('/home/me');
    });

    it('expands a tilde prefix', () => {
      expect(expandPath('~/code', '/cwd', '/home/me')).toBe(path.join('/home/me', 'code'));
    });

    it('resolves relative paths against cwd', () => {
      expect(expandPath('code/tools', '/work', '/home/me')).toBe(path.resolve('/work', 'code/tools'));
    });

    it('keeps absolute paths', () => {
      expect(expandPath('/srv/git', '/work', '/home/me')).toBe(path.resolve('/srv/git'));
    });
  });
});
