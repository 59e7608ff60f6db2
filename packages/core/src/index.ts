export type {
  AmbiguousBindingPolicy,
  BindingKind,
  Callable,
  DeclaredBindingKind,
  InterceptionCallback,
  Invocable,
  ProxyConfig,
  ProxyKind,
  Receiver,
} from './proxy/types';
export { CALLBACK_ARGLIST, WRAPPED } from './proxy/types';

export {
  attachProxy,
  bindingKindOf,
  bindProxy,
  isInterceptionProxy,
  proxyKindOf,
  wrapFunction,
  wrapGeneric,
  wrapMethod,
  type FunctionProxyOptions,
  type GenericProxyOptions,
  type MethodProxyOptions,
} from './proxy/proxyFactory';

export {
  anchorEquals,
  anchorNotEquals,
  identityHash,
  identityOf,
  isSameIdentity,
  representProxy,
  UNDECIDED,
  type EqualityResult,
  type Equatable,
  type Hashable,
} from './proxy/identity';
export { OWN_STATE_PREFIX } from './proxy/identityDelegate';
export { resolveAccess, type AccessResolution } from './proxy/callBinding';

export { chainInterceptors } from './pipeline/chainInterceptors';

export {
  createCallBindingError,
  isCallBindingError,
  type CallBindingError,
  type CallBindingErrorCode,
} from './errors/callBindingError';

export { getLogger, setLogger } from './observability/logger';
export { createPinoLogger, type CreatePinoLoggerOptions } from './observability/pinoLogger';

export {
  getRuntimeConfig,
  loadRuntimeConfig,
  resetRuntimeConfigForTests,
  LOG_LEVELS,
  type LogLevel,
  type RuntimeConfig,
} from './runtimeConfig';
export * from './config';
