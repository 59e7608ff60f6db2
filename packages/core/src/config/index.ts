export type { Env, ReadEnumEnvOptions } from './env';
export { readEnumEnv } from './env';
export { ConfigBuilder, createConfigBuilder } from './configBuilder';
export { createConfigAccessors, type ConfigAccessors } from './configAccessors';
