import { describe, it, expect, vi, beforeEach } from 'vitest';
import { applyEnvOverrides, loadConfig, loadCorpusSeed } from './config-loader.js';
import { ConfigurationError } from '@spurn/shared/src/utils/errors.js';
import { SchemaValidationError } from '@spurn/shared/src/utils/errors.js';

vi.mock('node:fs/promises', () => ({
  readFile: vi.fn(),
}));

const validConfig = {
  name: 'spurn',
  version: '1.0.0',
  server: { port: 3000 },
  corpus: { backend: 'memory' },
  similarity: { baseUrl: 'http://localhost:5001', timeoutMs: 2000 },
  morphology: {},
  answers: { plainTextTtlHours: 24 },
};

describe('loadConfig', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should load a valid service config', async () => {
    const { readFile } = await import('node:fs/promises');
    const mockReadFile = vi.mocked(readFile);
    mockReadFile.mockImplementation((path: unknown) => {
      const filePath = String(path);
      if (filePath.endsWith('service.json')) {
        return Promise.resolve(JSON.stringify(validConfig));
      }
      return Promise.reject(new Error(`Unexpected file: ${filePath}`));
    });

    const config = await loadConfig('/test/config', {});
    expect(config.name).toBe('spurn');
    expect(config.server.port).toBe(3000);
    expect(config.corpus.backend).toBe('memory');
    expect(config.morphology.timeoutMs).toBe(5000);
  });

  it('should let environment variables override the file', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(JSON.stringify(validConfig));

    const config = await loadConfig('/test/config', {
      PORT: '8080',
      SPURN_CORPUS_BACKEND: 'firestore',
      SPURN_GCP_PROJECT_ID: 'spurn-test',
    });
    expect(config.server.port).toBe(8080);
    expect(config.corpus.backend).toBe('firestore');
    expect(config.corpus.gcpProjectId).toBe('spurn-test');
    expect(config.similarity.baseUrl).toBe('http://localhost:5001');
  });

  it('should throw ConfigurationError for missing files', async () => {
    const { readFile } = await import('node:fs/promises');
    const error = new Error('File not found') as NodeJS.ErrnoException;
    error.code = 'ENOENT';
    vi.mocked(readFile).mockRejectedValue(error);

    await expect(loadConfig('/nonexistent', {})).rejects.toThrow(ConfigurationError);
  });

  it('should throw ConfigurationError for invalid JSON', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue('not valid json{{{');

    await expect(loadConfig('/test/config', {})).rejects.toThrow(ConfigurationError);
  });

  it('should throw SchemaValidationError for an unknown corpus backend', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(
      JSON.stringify({ ...validConfig, corpus: { backend: 'postgres' } }),
    );

    await expect(loadConfig('/test/config', {})).rejects.toThrow(SchemaValidationError);
  });

  it('should throw ConfigurationError for a non-numeric PORT', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(JSON.stringify(validConfig));

    await expect(loadConfig('/test/config', { PORT: 'eighty' })).rejects.toThrow(
      ConfigurationError,
    );
  });
});

describe('applyEnvOverrides', () => {
  it('should leave non-object input untouched', () => {
    expect(applyEnvOverrides('nope', { PORT: '1' })).toBe('nope');
  });
});

describe('loadCorpusSeed', () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  it('should parse article timestamps into dates', async () => {
    const { readFile } = await import('node:fs/promises');
    vi.mocked(readFile).mockResolvedValue(
      JSON.stringify({
        articles: [
          {
            id: 'a1',
            heading: 'Fyrirsögn',
            timestamp: '2026-10-01T08:00:00Z',
            domain: 'example.is',
            url: 'https://example.is/a1',
          },
        ],
        persons: [],
        entities: [],
      }),
    );

    const seed = await loadCorpusSeed('/test/corpus.json');
    expect(seed.articles[0].timestamp).toEqual(new Date('2026-10-01T08:00:00Z'));
    expect(seed.articles[0].visible).toBe(true);
    expect(seed.words).toEqual([]);
    expect(seed.lexicon).toEqual([]);
  });
});
