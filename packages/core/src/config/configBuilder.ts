import type { Env, ReadEnumEnvOptions } from './env';
import { readEnumEnv } from './env';

export class ConfigBuilder<TConfig extends Record<string, unknown>> {
  private readonly env: Env;
  private readonly config: TConfig;

  constructor(env: Env, config: TConfig) {
    this.env = env;
    this.config = config;
  }

  oneOf<TKey extends string, TValue extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    allowed: readonly TValue[],
    fallback: TValue,
    options?: ReadEnumEnvOptions,
  ): ConfigBuilder<TConfig & Record<TKey, TValue>> {
    const value = readEnumEnv(this.env, envKeys, allowed, fallback, options);
    const next = { ...this.config, [key]: value } as TConfig & Record<TKey, TValue>;
    return new ConfigBuilder(this.env, next);
  }

  build(): TConfig {
    return this.config;
  }
}

function defaultEnv(): Env {
  const maybeProcess = (globalThis as unknown as { process?: { env?: Env } }).process;
  return maybeProcess?.env ?? {};
}

export function createConfigBuilder(env: Env = defaultEnv()): ConfigBuilder<Record<string, never>> {
  return new ConfigBuilder(env, {} as Record<string, never>);
}
