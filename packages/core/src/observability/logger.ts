import type { Logger } from 'pino';

import { createLazyValue } from '../lifecycle/lazyValue';
import { representProxy } from '../proxy/identity';
import { getRuntimeConfig } from '../runtimeConfig';
import { createPinoLogger } from './pinoLogger';

/** Log fields holding callables or proxies render as `representProxy` text. */
export const proxySerializers = {
  callable: (value: unknown): string => representProxy(value),
  target: (value: unknown): string => representProxy(value),
};

const defaultLogger = createLazyValue(() =>
  createPinoLogger({
    level: getRuntimeConfig().logLevel,
    base: { component: 'interpose' },
    serializers: proxySerializers,
  }),
);

let overrideLogger: Logger | null = null;

export function getLogger(): Logger {
  return overrideLogger ?? defaultLogger.get();
}

/** Replaces the library logger; pass `null` to go back to the configured default. */
export function setLogger(logger: Logger | null): void {
  overrideLogger = logger;
}

export function resetLoggerForTests(): void {
  overrideLogger = null;
  defaultLogger.reset();
}
