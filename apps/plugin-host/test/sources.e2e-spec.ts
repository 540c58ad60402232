import { Test, TestingModule } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppModule } from '../src/app.module';
import { GIT_COMMAND_RUNNER } from '../src/modules/sources/services/git-command-runner';
import { FakeGitRunner } from './mocks/fake-git-runner';

const REPO_URL = 'https://git.example.com/acme/weather.git';

const MANIFEST = JSON.stringify({
  name: 'weather',
  version: '1.2.0',
  nodes: [{ name: 'forecast' }],
});

describe('Sources E2E', () => {
  let app: NestFastifyApplication;
  let git: FakeGitRunner;
  let outputRoot: string;

  beforeEach(async () => {
    git = new FakeGitRunner({
      'manifest.json': MANIFEST,
      'index.js': 'module.exports = {};',
      'lib/forecast.js': 'module.exports = {};',
    });
    outputRoot = await mkdtemp(join(tmpdir(), 'sources-e2e-'));

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule.forSources()],
    })
      .overrideProvider(GIT_COMMAND_RUNNER)
      .useValue(git)
      .compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter());

    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    await app.close();
    await rm(outputRoot, { recursive: true, force: true });
  });

  it('/health (GET) reports the service without a plugin', async () => {
    const result = await app.inject({ method: 'GET', url: '/health' });

    expect(JSON.parse(result.payload)).toEqual({ status: 'healthy', service: 'plugin-host' });
  });

  it('/health/ready (GET) checks for git', async () => {
    const result = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.payload)).toEqual({ ready: true, checks: { git: 'ok' } });
  });

  it('/health/ready (GET) answers 503 without git', async () => {
    git.failOn('--version', 'git: command not found');

    const result = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(result.statusCode).toBe(503);
    expect(JSON.parse(result.payload)).toEqual({
      error: 'Service Unavailable',
      detail: 'Not ready: git',
    });
  });

  it('/api/sources/manifest (POST) reads the manifest from a clone', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/sources/manifest',
      payload: { source: { repoUrl: REPO_URL } },
    });

    expect(result.statusCode).toBe(200);
    expect(JSON.parse(result.payload)).toEqual({
      name: 'weather',
      version: '1.2.0',
      nodes: [{ name: 'forecast', inputs: [], outputs: [] }],
      integrations: [],
    });
    expect(git.commands()[0]).toMatch(/^clone --depth 1 --filter=blob:none --branch main -- /);
  });

  it('/api/sources/download (POST) materializes the repository', async () => {
    const result = await app.inject({
      method: 'POST',
      url: '/api/sources/download',
      payload: { source: { repoUrl: REPO_URL }, outputDir: outputRoot },
    });

    expect(result.statusCode).toBe(201);
    const { path } = JSON.parse(result.payload);
    expect(path).toBe(join(outputRoot, 'weather'));
    await expect(readFile(join(path, 'lib/forecast.js'), 'utf-8')).resolves.toBe('module.exports = {};');
  });

  it('/api/sources/download (POST) answers 409 when the target exists', async () => {
    const payload = { source: { repoUrl: REPO_URL }, outputDir: outputRoot };
    await app.inject({ method: 'POST', url: '/api/sources/download', payload });

    const result = await app.inject({ method: 'POST', url: '/api/sources/download', payload });

    expect(result.statusCode).toBe(409);
    expect(JSON.parse(result.payload)).toEqual({
      error: 'Conflict',
      detail: `Destination ${join(outputRoot, 'weather')} already exists`,
    });
  });

  it('/api/sources/manifest (POST) answers 404 for a missing repository', async () => {
    git.failOn('clone', "remote: Repository not found.\nfatal: repository 'x' not found");

    const result = await app.inject({
      method: 'POST',
      url: '/api/sources/manifest',
      payload: { source: { repoUrl: REPO_URL } },
    });

    expect(result.statusCode).toBe(404);
    expect(JSON.parse(result.payload).detail).toBe(
      `Repository not found: ${REPO_URL}. Check that the URL is correct and the repository exists.`,
    );
  });

  it('/api/sources/manifest (POST) answers 400 without a source', async () => {
    const result = await app.inject({ method: 'POST', url: '/api/sources/manifest', payload: {} });

    expect(result.statusCode).toBe(400);
    expect(JSON.parse(result.payload)).toEqual({ error: 'Bad Request', detail: 'source: Required' });
  });
});
