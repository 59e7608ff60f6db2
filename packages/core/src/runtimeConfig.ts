import { createConfigAccessors, createConfigBuilder, type Env } from './config';
import type { AmbiguousBindingPolicy } from './proxy/types';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RuntimeConfig {
  logLevel: LogLevel;
  ambiguousBinding: AmbiguousBindingPolicy;
}

const AMBIGUOUS_BINDING_POLICIES: readonly AmbiguousBindingPolicy[] = ['fallback', 'throw'];

export function loadRuntimeConfig(env?: Env): RuntimeConfig {
  const config: RuntimeConfig = createConfigBuilder(env)
    .oneOf('logLevel', ['INTERPOSE_LOG_LEVEL', 'LOG_LEVEL'], LOG_LEVELS, 'warn')
    .oneOf('ambiguousBinding', 'INTERPOSE_AMBIGUOUS_BINDING', AMBIGUOUS_BINDING_POLICIES, 'fallback')
    .build();

  return config;
}

const configAccessors = createConfigAccessors(() => loadRuntimeConfig());

export function getRuntimeConfig(): RuntimeConfig {
  return configAccessors.getConfig();
}

export function resetRuntimeConfigForTests(): void {
  configAccessors.resetConfigForTests();
}
