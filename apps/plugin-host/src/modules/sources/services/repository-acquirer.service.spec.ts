import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, readdir, readlink, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { FakeGitRunner } from '../../../../test/mocks/fake-git-runner';
import { GitSourceSchema, type GitSourceInput } from '../dtos/git-source.dto';
import {
  AcquisitionAbortedError,
  DestinationOccupiedError,
  NetworkUnreachableError,
  RepositoryNotFoundError,
  SourceAcquisitionError,
  SourceAuthenticationError,
  SubdirectoryNotFoundError,
} from '../errors/source-errors';
import { RepositoryAcquirerService } from './repository-acquirer.service';

const REPO_FILES = {
  'README.md': '# plugins\n',
  'plugins/weather/manifest.json': '{"name":"weather","version":"1.0.0"}',
  'plugins/weather/index.js': 'module.exports = {};\n',
  'plugins/news/manifest.json': '{"name":"news","version":"0.1.0"}',
};

function source(input: Partial<GitSourceInput> = {}) {
  return GitSourceSchema.parse({ repoUrl: 'https://github.com/acme/plugins.git', ...input });
}

describe('RepositoryAcquirerService', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await mkdtemp(join(tmpdir(), 'acquirer-spec-'));
  });

  afterEach(async () => {
    await rm(outputDir, { recursive: true, force: true });
  });

  describe('selectStrategy', () => {
    it('uses a sparse checkout when a subdirectory is requested', () => {
      const service = new RepositoryAcquirerService(new FakeGitRunner({}));
      expect(service.selectStrategy({ path: 'plugins/weather' })).toBe('sparse');
      expect(service.selectStrategy({})).toBe('full');
    });
  });

  describe('full checkout', () => {
    it('clones shallowly and copies the tree without .git', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);
      const target = join(outputDir, 'plugins');

      const result = await service.acquire(source(), target);

      expect(result).toBe(target);
      expect((await readdir(target)).sort()).toEqual(['README.md', 'plugins']);
      expect(await readFile(join(target, 'plugins/weather/index.js'), 'utf-8')).toBe(
        'module.exports = {};\n',
      );
      expect(git.calls).toHaveLength(1);
      expect(git.calls[0].args).toEqual([
        'clone',
        '--depth',
        '1',
        '--filter=blob:none',
        '--branch',
        'main',
        '--',
        'https://github.com/acme/plugins.git',
        git.lastCloneDir(),
      ]);
    });

    it('embeds credentials in the clone URL only', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);

      await service.acquire(source({ token: 'test-token' }), join(outputDir, 'plugins'));

      expect(git.calls[0].args).toContain('https://test-token@github.com/acme/plugins.git');
    });

    it('checks out a pinned commit after cloning', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);

      await service.acquire(source({ commit: 'abc1234' }), join(outputDir, 'plugins'));

      const cloneDir = git.lastCloneDir();
      expect(git.commands()).toEqual([
        `clone --depth 1 --filter=blob:none --branch main --no-checkout -- https://github.com/acme/plugins.git ${cloneDir}`,
        'fetch --depth 1 --filter=blob:none origin abc1234',
        'checkout --detach abc1234',
      ]);
      expect(git.calls[1].cwd).toBe(cloneDir);
      expect(existsSync(join(outputDir, 'plugins', 'README.md'))).toBe(true);
    });

    it('keeps relative symlinks pointing inside the copied tree', async () => {
      const git = new FakeGitRunner(REPO_FILES).withSymlink('plugins/weather/README.md', '../../README.md');
      const service = new RepositoryAcquirerService(git);
      const target = join(outputDir, 'plugins');

      await service.acquire(source(), target);

      const link = join(target, 'plugins/weather/README.md');
      expect(await readlink(link)).toBe('../../README.md');
      expect(await readFile(link, 'utf-8')).toBe('# plugins\n');
    });

    it('removes the working directory afterwards', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);

      await service.acquire(source(), join(outputDir, 'plugins'));

      const cloneDir = git.lastCloneDir();
      expect(cloneDir).toBeDefined();
      expect(existsSync(dirname(cloneDir ?? ''))).toBe(false);
    });
  });

  describe('sparse checkout', () => {
    it('materializes only the requested subdirectory', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);
      const target = join(outputDir, 'weather');

      await service.acquire(source({ path: 'plugins/weather' }), target);

      expect((await readdir(target)).sort()).toEqual(['index.js', 'manifest.json']);
      const cloneDir = git.lastCloneDir();
      expect(git.commands()).toEqual([
        `clone --depth 1 --filter=blob:none --no-checkout --sparse --branch main -- https://github.com/acme/plugins.git ${cloneDir}`,
        'sparse-checkout init --cone',
        'sparse-checkout set plugins/weather',
        'checkout -B main origin/main',
      ]);
    });

    it('fails when the subdirectory is missing and leaves no target', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);
      const target = join(outputDir, 'missing');

      await expect(service.acquire(source({ path: 'plugins/missing' }), target)).rejects.toBeInstanceOf(
        SubdirectoryNotFoundError,
      );
      expect(existsSync(target)).toBe(false);
      expect(existsSync(dirname(git.lastCloneDir() ?? ''))).toBe(false);
    });
  });

  describe('failures', () => {
    it('refuses an occupied destination before running git', async () => {
      const git = new FakeGitRunner(REPO_FILES);
      const service = new RepositoryAcquirerService(git);
      const target = join(outputDir, 'plugins');
      await mkdir(target);

      await expect(service.acquire(source(), target)).rejects.toBeInstanceOf(DestinationOccupiedError);
      expect(git.calls).toHaveLength(0);
    });

    it('classifies authentication failures and can be retried', async () => {
      const target = join(outputDir, 'plugins');
      const failing = new FakeGitRunner(REPO_FILES).failOn(
        'clone',
        "fatal: Authentication failed for 'https://github.com/acme/plugins.git/'",
      );

      await expect(
        new RepositoryAcquirerService(failing).acquire(source(), target),
      ).rejects.toBeInstanceOf(SourceAuthenticationError);
      expect(existsSync(target)).toBe(false);

      await expect(
        new RepositoryAcquirerService(new FakeGitRunner(REPO_FILES)).acquire(source(), target),
      ).resolves.toBe(target);
    });

    it('classifies missing repositories', async () => {
      const git = new FakeGitRunner(REPO_FILES).failOn('clone', 'remote: Repository not found.');

      await expect(
        new RepositoryAcquirerService(git).acquire(source(), join(outputDir, 'plugins')),
      ).rejects.toBeInstanceOf(RepositoryNotFoundError);
    });

    it('reports a timed-out clone as an unreachable host', async () => {
      const git = new FakeGitRunner(REPO_FILES).timeOutOn('clone');
      const target = join(outputDir, 'plugins');

      const error = await new RepositoryAcquirerService(git)
        .acquire(source(), target)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NetworkUnreachableError);
      expect(error).toMatchObject({ statusCode: 502, details: { reason: 'git clone timed out' } });
      expect(existsSync(target)).toBe(false);
    });

    it('keeps unclassified output with credentials masked', async () => {
      const git = new FakeGitRunner(REPO_FILES).failOn(
        'clone',
        'error: RPC failed while talking to https://test-token@github.com/acme/plugins.git',
      );

      const error = await new RepositoryAcquirerService(git)
        .acquire(source({ token: 'test-token' }), join(outputDir, 'plugins'))
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SourceAcquisitionError);
      expect(error instanceof SourceAcquisitionError && error.rawText).toBe(
        'error: RPC failed while talking to https://***@github.com/acme/plugins.git',
      );
    });

    it('stops when the signal aborts and cleans up', async () => {
      const git = new FakeGitRunner(REPO_FILES).hangUntilAborted('clone');
      const service = new RepositoryAcquirerService(git);
      const controller = new AbortController();
      const target = join(outputDir, 'plugins');

      const pending = service.acquire(source(), target, { signal: controller.signal });
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toBeInstanceOf(AcquisitionAbortedError);
      expect(existsSync(target)).toBe(false);
      expect(existsSync(dirname(git.lastCloneDir() ?? ''))).toBe(false);
    });
  });
});
