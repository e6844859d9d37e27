import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { PathResolver } from '../../src/classpath/PathResolver';
import type { ClasspathSource } from '../../src/classpath/ClasspathSource';
import { ResolutionError } from '../../src/utils/errors';
import { Logger } from '../../src/utils/logger';

describe('PathResolver', () => {
  let tempDir: string;
  let realDir: string;
  let logPath: string;
  let resolver: PathResolver;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'junit-launch-resolver-'));
    realDir = await fs.realpath(tempDir);
    logPath = path.join(tempDir, 'debug.log');
    resolver = new PathResolver(new Logger('test', { logPath, debug: true }));

    await fs.mkdir(path.join(tempDir, 'classes'));
    await fs.writeFile(path.join(tempDir, 'a.jar'), '');
    await fs.writeFile(path.join(tempDir, 'b.jar'), '');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should keep existing entries in input order', async () => {
    const result = await resolver.resolve([
      path.join(tempDir, 'b.jar'),
      path.join(tempDir, 'classes'),
      path.join(tempDir, 'a.jar')
    ]);

    expect(result.split(path.delimiter)).toEqual([
      path.join(realDir, 'b.jar'),
      path.join(realDir, 'classes'),
      path.join(realDir, 'a.jar')
    ]);
  });

  it('should skip entries that do not exist and log them', async () => {
    const missing = path.join(tempDir, 'missing.jar');
    const result = await resolver.resolve([missing, path.join(tempDir, 'a.jar')]);

    expect(result).toBe(path.join(realDir, 'a.jar'));
    const log = await fs.readFile(logPath, 'utf8');
    expect(log).toContain(`   X ${missing} // doesn't exist`);
    expect(log).toContain(`  -> ${path.join(realDir, 'a.jar')}`);
  });

  it('should make relative entries absolute', async () => {
    const relative = path.relative(process.cwd(), path.join(tempDir, 'a.jar'));
    expect(await resolver.resolve([relative])).toBe(path.join(realDir, 'a.jar'));
  });

  it('should normalize symbolic links and drop duplicates after the first occurrence', async () => {
    await fs.symlink(path.join(tempDir, 'a.jar'), path.join(tempDir, 'link.jar'));

    const result = await resolver.resolve([
      path.join(tempDir, 'b.jar'),
      path.join(tempDir, 'link.jar'),
      path.join(tempDir, 'classes', '..', 'b.jar'),
      path.join(tempDir, 'a.jar')
    ]);

    expect(result.split(path.delimiter)).toEqual([
      path.join(realDir, 'b.jar'),
      path.join(realDir, 'a.jar')
    ]);
  });

  it('should return an empty string when nothing survives', async () => {
    expect(await resolver.resolve([])).toBe('');
    expect(await resolver.resolve([path.join(tempDir, 'nope')])).toBe('');
  });

  it('should not cache results between calls', async () => {
    const late = path.join(tempDir, 'late.jar');
    expect(await resolver.resolve([late])).toBe('');

    await fs.writeFile(late, '');
    expect(await resolver.resolve([late])).toBe(path.join(realDir, 'late.jar'));
  });

  describe('resolveFrom', () => {
    it('should resolve the elements a source provides', async () => {
      const source: ClasspathSource = {
        describe: () => 'test source',
        getTestClasspathElements: async () => [path.join(tempDir, 'a.jar'), path.join(tempDir, 'gone')]
      };

      expect(await resolver.resolveFrom(source)).toBe(path.join(realDir, 'a.jar'));
    });

    it('should propagate resolution failures', async () => {
      const source: ClasspathSource = {
        describe: () => 'unresolved source',
        getTestClasspathElements: async () => {
          throw new ResolutionError('Resolving test class-path elements failed');
        }
      };

      await expect(resolver.resolveFrom(source)).rejects.toBeInstanceOf(ResolutionError);
    });
  });
});
