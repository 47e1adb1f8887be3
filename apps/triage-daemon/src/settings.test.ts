import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigSettingsProvider } from './settings';

describe('ConfigSettingsProvider', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'triage-settings-'));
    configPath = join(dir, 'config.yaml');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads provider settings and the API key from config.yaml', async () => {
    await writeFile(
      configPath,
      ['llm:', '  model: gpt-5', '  reasoningEffort: high', 'credentials:', '  OPENAI_API_KEY: test-secret', ''].join(
        '\n'
      )
    );

    const settings = await new ConfigSettingsProvider(configPath, {}).getLLMSettings();

    expect(settings).toEqual({
      provider: 'openai',
      apiKey: 'test-secret',
      model: 'gpt-5',
      reasoningEffort: 'high',
      baseUrl: undefined,
    });
  });

  it('falls back to the environment for the API key', async () => {
    const settings = await new ConfigSettingsProvider(configPath, {
      OPENAI_API_KEY: 'env-secret',
    }).getLLMSettings();

    expect(settings?.apiKey).toBe('env-secret');
  });

  it('returns no proxy config when none is set', async () => {
    expect(await new ConfigSettingsProvider(configPath, {}).getProxyConfig()).toBeUndefined();
  });

  it('fills proxy flags with defaults', async () => {
    await writeFile(configPath, 'proxy:\n  url: http://proxy.internal:3128\n  openaiEnabled: true\n');

    expect(await new ConfigSettingsProvider(configPath, {}).getProxyConfig()).toEqual({
      url: 'http://proxy.internal:3128',
      noProxy: '',
      openaiEnabled: true,
      slackEnabled: false,
      zabbixEnabled: false,
    });
  });

  it('picks up config changes on the next lookup', async () => {
    const provider = new ConfigSettingsProvider(configPath, {});
    await writeFile(configPath, 'llm:\n  model: first\n');
    expect((await provider.getLLMSettings())?.model).toBe('first');

    await writeFile(configPath, 'llm:\n  model: second\n');
    expect((await provider.getLLMSettings())?.model).toBe('second');
  });
});
