import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../utils/errors';
import { getConfigPath, getCredential, loadConfig, parseConfig, resolveConfig } from './config-manager';

describe('parseConfig', () => {
  it('returns an empty config for an empty document', () => {
    expect(parseConfig('')).toEqual({});
  });

  it('reads known sections', () => {
    const config = parseConfig(
      [
        'daemon:',
        '  port: 4040',
        'execution:',
        '  codexBin: /opt/codex/bin/codex',
        '  envPrefixes: [CODEX_, AGENT_]',
        'proxy:',
        '  url: http://proxy.internal:3128',
        '  openaiEnabled: true',
      ].join('\n')
    );

    expect(config.daemon).toEqual({ port: 4040, host: undefined });
    expect(config.execution?.codexBin).toBe('/opt/codex/bin/codex');
    expect(config.execution?.envPrefixes).toEqual(['CODEX_', 'AGENT_']);
    expect(config.proxy?.openaiEnabled).toBe(true);
    expect(config.llm).toBeUndefined();
  });

  it('rejects wrongly typed values', () => {
    expect(() => parseConfig('daemon:\n  port: "eighty"')).toThrow(ValidationError);
    expect(() => parseConfig('proxy: [1, 2]')).toThrow('config.proxy must be a mapping');
  });
});

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const resolved = resolveConfig({}, { TRIAGE_HOME: '/srv/triage' });

    expect(resolved.daemon).toEqual({ port: 3030, host: 'localhost' });
    expect(resolved.database.url).toBe('file:~/.triage/triage.db');
    expect(resolved.execution).toEqual({
      codexBin: 'codex',
      workspaceDir: '/srv/triage/workspaces',
      fallbackTimeoutMs: 1_800_000,
      envPrefixes: ['CODEX_'],
    });
    expect(resolved.llm.provider).toBe('openai');
  });

  it('lets the environment override the file', () => {
    const resolved = resolveConfig(
      { daemon: { port: 4040 }, execution: { fallbackTimeoutMs: 1000 } },
      { TRIAGE_PORT: '5050', TRIAGE_FALLBACK_TIMEOUT_MS: '2000', TRIAGE_HOME: '/srv/triage' }
    );

    expect(resolved.daemon.port).toBe(5050);
    expect(resolved.execution.fallbackTimeoutMs).toBe(2000);
  });

  it('rejects non-numeric overrides', () => {
    expect(() => resolveConfig({}, { TRIAGE_PORT: 'abc' })).toThrow(
      'TRIAGE_PORT must be a number, got "abc"'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'triage-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns an empty config when the file is missing', async () => {
    await expect(loadConfig(join(dir, 'missing.yaml'))).resolves.toEqual({});
  });

  it('parses the file', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'llm:\n  model: gpt-5\n');

    const config = await loadConfig(path);
    expect(config.llm?.model).toBe('gpt-5');
  });

  it('resolves the default path under TRIAGE_HOME', () => {
    expect(getConfigPath({ TRIAGE_HOME: dir })).toBe(join(dir, 'config.yaml'));
  });
});

describe('getCredential', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefers config.yaml over the environment', () => {
    expect(
      getCredential('OPENAI_API_KEY', { credentials: { OPENAI_API_KEY: 'test-secret' } }, { OPENAI_API_KEY: 'env-secret' })
    ).toBe('test-secret');
  });

  it('falls back to the environment', () => {
    expect(getCredential('OPENAI_API_KEY', {}, { OPENAI_API_KEY: 'env-secret' })).toBe('env-secret');
    expect(getCredential('OPENAI_API_KEY', {}, {})).toBeUndefined();
  });
});
