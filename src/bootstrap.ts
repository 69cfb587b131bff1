// Ensure env is loaded before anything reads configuration
import { env } from './config/env.config';

import { container, KEYS } from './container';
import { SportsDataProviderFactory } from './integrations/provider-factory';
import { ISportsDataProvider } from './integrations/shared/sports-data-provider.interface';
import { ProjectionService } from './modules/projections/projections.service';

/**
 * Register every injectable with the container.
 * Runs once on import, before routes resolve their services.
 */
export function bootstrap(): void {
  container.register<ISportsDataProvider>(KEYS.SPORTS_DATA_PROVIDER, () =>
    SportsDataProviderFactory.createProvider(env.SPORTS_DATA_PROVIDER, {
      offlineSlatePath: env.OFFLINE_SLATE_PATH,
      apiUrl: env.SPORTS_DATA_API_URL,
      apiKey: env.SPORTS_DATA_API_KEY,
      timeoutMs: env.SPORTS_DATA_TIMEOUT_MS,
    })
  );

  container.register(KEYS.PROJECTION_SERVICE, () =>
    new ProjectionService(container.resolve<ISportsDataProvider>(KEYS.SPORTS_DATA_PROVIDER), {
      starterPolicy: env.STARTER_RESOLUTION_POLICY,
      renormalizeRedZone: env.RENORMALIZE_RED_ZONE,
      fetchTimeoutMs: env.SPORTS_DATA_TIMEOUT_MS,
    })
  );
}

bootstrap();
