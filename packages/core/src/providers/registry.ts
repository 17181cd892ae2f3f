/**
 * Provider lookup by name
 */

import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ProviderName } from '../types/index.js';
import { JiraProvider, type JiraProviderConfig } from './jira.js';
import { LinearProvider, type LinearProviderConfig } from './linear.js';
import type { IssueProvider } from './types.js';

export interface ProvidersConfig {
  jira?: JiraProviderConfig;
  linear?: LinearProviderConfig;
}

export class ProviderRegistry {
  private readonly providers = new Map<ProviderName, IssueProvider>();

  register(provider: IssueProvider): this {
    this.providers.set(provider.name, provider);
    return this;
  }

  has(name: ProviderName): boolean {
    return this.providers.has(name);
  }

  /**
   * @throws {ConfigurationError} when no provider is registered under the name
   */
  get(name: ProviderName): IssueProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ConfigurationError(`Provider '${name}' is not registered`);
    }
    return provider;
  }

  list(): IssueProvider[] {
    return [...this.providers.values()];
  }
}

/**
 * Registry with the Jira and Linear adapters
 */
export function createProviderRegistry(config: ProvidersConfig, logger?: Logger): ProviderRegistry {
  return new ProviderRegistry()
    .register(new JiraProvider({ logger: logger?.child({ provider: 'jira' }), ...config.jira }))
    .register(new LinearProvider({ logger: logger?.child({ provider: 'linear' }), ...config.linear }));
}
