import { createLazyValue } from '../lifecycle/lazyValue';

export type ConfigAccessors<TConfig> = {
  getConfig(): TConfig;
  resetConfigForTests(): void;
};

/**
 * Wraps a config loader in a lazily cached `getConfig`, plus a reset hook so tests
 * can change the environment between cases.
 */
export function createConfigAccessors<TConfig>(loadConfig: () => TConfig): ConfigAccessors<TConfig> {
  const cachedConfig = createLazyValue(loadConfig);

  return {
    getConfig: () => cachedConfig.get(),
    resetConfigForTests: () => cachedConfig.reset(),
  };
}
