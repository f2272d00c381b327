/**
 * @pricevault/app
 *
 * Configuration, wiring and fixture providers for the price vault.
 */

export {
  loadConfig,
  detectCachePath,
  cacheConnectionString,
  getConfigSummary,
  configSchema,
  envMapping,
  type Config,
  type LoadConfigOptions,
} from './config/index.js';

export {
  createPriceVault,
  type PriceVault,
  type PriceVaultOptions,
  type PriceVaultProviders,
} from './bootstrap.js';

export {
  FixtureFundamentalsProvider,
  FixturePriceProvider,
  selectRecentBars,
  DEFAULT_FIXTURES_PATH,
  type FixtureProviderConfig,
  type PriceFixture,
} from './providers/fixture-provider.js';
