import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@spurn/shared/src/utils/errors.js';
import { validateCorpusSeed, validateServiceConfig } from './validators.js';
import type { ServiceConfig } from './service-config.schema.js';
import type { CorpusSeed } from './query.schema.js';

export const CONFIG_FILE_NAME = 'service.json';

export async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    throw new ConfigurationError(
      `Failed to read configuration file ${filePath}: ${nodeError.message}`,
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function parsePort(value: string): number {
  const port = parseInt(value, 10);
  if (Number.isNaN(port)) {
    throw new ConfigurationError(`PORT must be a number, got "${value}"`);
  }
  return port;
}

/** Environment variables take precedence over the file. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const server = section(raw, 'server');
  const corpus = section(raw, 'corpus');
  const similarity = section(raw, 'similarity');
  const morphology = section(raw, 'morphology');

  if (env['PORT']) server['port'] = parsePort(env['PORT']);
  if (env['SPURN_CORPUS_BACKEND']) corpus['backend'] = env['SPURN_CORPUS_BACKEND'];
  if (env['SPURN_GCP_PROJECT_ID']) corpus['gcpProjectId'] = env['SPURN_GCP_PROJECT_ID'];
  if (env['SPURN_SIMILARITY_URL']) similarity['baseUrl'] = env['SPURN_SIMILARITY_URL'];
  if (env['SPURN_MORPHOLOGY_URL']) morphology['baseUrl'] = env['SPURN_MORPHOLOGY_URL'];

  return { ...raw, server, corpus, similarity, morphology };
}

export async function loadConfig(
  configDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ServiceConfig> {
  const raw = await readJsonFile(join(configDir, CONFIG_FILE_NAME));
  return validateServiceConfig(applyEnvOverrides(raw, env));
}

export async function loadCorpusSeed(filePath: string): Promise<CorpusSeed> {
  return validateCorpusSeed(await readJsonFile(filePath));
}
