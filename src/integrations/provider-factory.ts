import { ISportsDataProvider } from './shared/sports-data-provider.interface';
import { OfflineSportsDataProvider } from './offline/offline-sports-data-provider';
import { SportsDataApiClient } from './live/sports-data-api-client';
import { LiveSportsDataProvider } from './live/live-sports-data-provider';
import { logger } from '../config/logger.config';
import { ValidationException } from '../utils/exceptions';

export type ProviderType = 'offline' | 'live';

export interface ProviderConfig {
  offlineSlatePath?: string;
  apiUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Factory for creating sports data provider instances
 *
 * The provider is chosen by configuration, so offline and live data sources
 * share one code path through the projection service.
 */
export class SportsDataProviderFactory {
  /**
   * Create a sports data provider based on type
   * @param providerType - Provider identifier (default: 'offline')
   * @param config - Provider-specific configuration
   */
  static createProvider(
    providerType: ProviderType = 'offline',
    config: ProviderConfig = {}
  ): ISportsDataProvider {
    logger.info(`Creating sports data provider: ${providerType}`);

    switch (providerType) {
      case 'offline':
        return new OfflineSportsDataProvider(config.offlineSlatePath ?? 'data/offline-slate.json');

      case 'live': {
        if (!config.apiUrl) {
          throw new ValidationException('Live sports data provider requires an API URL');
        }
        const client = new SportsDataApiClient({
          baseURL: config.apiUrl,
          apiKey: config.apiKey,
          timeoutMs: config.timeoutMs ?? 10000,
        });
        return new LiveSportsDataProvider(client);
      }

      default: {
        const unknownType: never = providerType;
        throw new ValidationException(`Unknown sports data provider: ${String(unknownType)}`);
      }
    }
  }
}
