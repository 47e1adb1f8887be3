/**
 * Worker Service
 *
 * Connection status of the codex worker, and proxy settings pushed to it.
 */

import { BadRequest, type Params, Unavailable } from '@triage/core/feathers';
import type { ProxyConfig } from '@triage/core/types';
import { WorkerNotConnectedError } from '@triage/core/utils/errors';
import type { WorkerConnectionManager } from '../dispatch/connection-manager';

export interface WorkerStatus {
  connected: boolean;
}

export type ProxyConfigData = Partial<ProxyConfig> & { url: string };

export class WorkerService {
  constructor(private readonly manager: WorkerConnectionManager) {}

  async find(_params?: Params): Promise<WorkerStatus> {
    return { connected: this.manager.isConnected() };
  }

  /**
   * Push proxy settings to the connected worker
   */
  async create(data: ProxyConfigData, _params?: Params): Promise<ProxyConfig> {
    if (typeof data.url !== 'string') {
      throw new BadRequest('url is required');
    }
    const config: ProxyConfig = {
      url: data.url,
      noProxy: data.noProxy ?? '',
      openaiEnabled: data.openaiEnabled ?? false,
      slackEnabled: data.slackEnabled ?? false,
      zabbixEnabled: data.zabbixEnabled ?? false,
    };

    try {
      await this.manager.broadcastProxyConfig(config);
    } catch (error) {
      if (error instanceof WorkerNotConnectedError) {
        throw new Unavailable(error.message);
      }
      throw error;
    }
    return config;
  }
}
