import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SandboxPathResolver } from './path-resolver';
import { InvalidPathError, SandboxEscapeError } from '../errors';

describe('SandboxPathResolver', () => {
  let base: string;
  let resolver: SandboxPathResolver;

  beforeEach(() => {
    base = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-agent-resolver-'));
    resolver = SandboxPathResolver.create(path.join(base, 'workspace'));
  });

  afterEach(() => {
    fs.rmSync(base, { recursive: true, force: true });
  });

  describe('create', () => {
    it('should create the workspace directory when absent', () => {
      expect(fs.statSync(resolver.root).isDirectory()).toBe(true);
      expect(path.isAbsolute(resolver.root)).toBe(true);
    });
  });

  describe('resolve', () => {
    it('should resolve a relative path inside the root', () => {
      expect(resolver.resolve('app.py')).toBe(path.join(resolver.root, 'app.py'));
      expect(resolver.resolve('src/lib/util.py')).toBe(
        path.join(resolver.root, 'src', 'lib', 'util.py')
      );
    });

    it('should return the root itself for "."', () => {
      expect(resolver.resolve('.')).toBe(resolver.root);
    });

    it('should accept ".." segments that stay inside the root', () => {
      expect(resolver.resolve('src/../app.py')).toBe(path.join(resolver.root, 'app.py'));
    });

    it('should accept absolute paths inside the root', () => {
      const inside = path.join(resolver.root, 'notes.txt');
      expect(resolver.resolve(inside)).toBe(inside);
    });

    it('should be idempotent when re-resolving its own output', () => {
      const first = resolver.resolve('a/b/../c.txt');
      expect(resolver.resolve(first)).toBe(first);
    });

    it('should reject empty paths', () => {
      expect(() => resolver.resolve('')).toThrow(InvalidPathError);
      expect(() => resolver.resolve('   ')).toThrow(InvalidPathError);
    });

    it.each(['..', '../outside.txt', '../../etc/passwd', 'src/../../x', '/etc/passwd'])(
      'should reject %s as a sandbox escape',
      (requested) => {
        expect(() => resolver.resolve(requested)).toThrow(SandboxEscapeError);
      }
    );

    it('should reject a sibling directory sharing the root as a prefix', () => {
      const sibling = `${resolver.root}-other/file.txt`;
      expect(() => resolver.resolve(sibling)).toThrow(SandboxEscapeError);
    });

    it('should reject a symlink pointing outside the root', () => {
      const outside = path.join(base, 'outside');
      fs.mkdirSync(outside);
      fs.writeFileSync(path.join(outside, 'secret.txt'), 'secret');
      fs.symlinkSync(outside, path.join(resolver.root, 'link'));

      expect(() => resolver.resolve('link/secret.txt')).toThrow(SandboxEscapeError);
      expect(() => resolver.resolve('link/new-file.txt')).toThrow(SandboxEscapeError);
    });

    it('should reject a dangling symlink whose target is outside the root', () => {
      fs.symlinkSync(path.join(base, 'not-yet-created.txt'), path.join(resolver.root, 'dangling'));

      expect(() => resolver.resolve('dangling')).toThrow(SandboxEscapeError);
    });

    it('should allow a symlink that stays inside the root', () => {
      fs.mkdirSync(path.join(resolver.root, 'real'));
      fs.symlinkSync(path.join(resolver.root, 'real'), path.join(resolver.root, 'alias'));

      expect(resolver.resolve('alias/file.txt')).toBe(
        path.join(resolver.root, 'real', 'file.txt')
      );
    });
  });

  describe('relative', () => {
    it('should render paths relative to the root', () => {
      expect(resolver.relative(path.join(resolver.root, 'src', 'a.ts'))).toBe(
        path.join('src', 'a.ts')
      );
      expect(resolver.relative(resolver.root)).toBe('.');
    });
  });
});
