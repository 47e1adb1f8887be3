/**
 * Settings provider backed by ~/.triage/config.yaml
 *
 * The file is re-read on every lookup, so credential and proxy changes apply
 * to the next dispatched incident without a restart.
 */

import { getConfigPath, getCredential, loadConfig, resolveConfig } from '@triage/core/config';
import type { LLMSettings, ProxyConfig, SettingsProvider } from '@triage/core/types';

export class ConfigSettingsProvider implements SettingsProvider {
  constructor(
    private readonly configPath?: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  private load() {
    return loadConfig(this.configPath ?? getConfigPath(this.env));
  }

  async getLLMSettings(): Promise<LLMSettings | undefined> {
    const config = await this.load();
    const { llm } = resolveConfig(config, this.env);
    return {
      provider: llm.provider,
      apiKey: getCredential('OPENAI_API_KEY', config, this.env),
      model: llm.model,
      reasoningEffort: llm.reasoningEffort,
      baseUrl: llm.baseUrl,
    };
  }

  async getProxyConfig(): Promise<ProxyConfig | undefined> {
    const { proxy } = resolveConfig(await this.load(), this.env);
    if (!proxy.url && !proxy.noProxy) {
      return undefined;
    }
    return {
      url: proxy.url ?? '',
      noProxy: proxy.noProxy ?? '',
      openaiEnabled: proxy.openaiEnabled ?? false,
      slackEnabled: proxy.slackEnabled ?? false,
      zabbixEnabled: proxy.zabbixEnabled ?? false,
    };
  }
}
