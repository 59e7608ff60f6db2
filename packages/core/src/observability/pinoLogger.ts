import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { context, trace } from '@opentelemetry/api';

export type CreatePinoLoggerOptions = {
  level: string;
  destination?: DestinationStream;
  base?: LoggerOptions['base'];
  serializers?: LoggerOptions['serializers'];
};

const traceContextMixin: NonNullable<LoggerOptions['mixin']> = () => {
  const span = trace.getSpan(context.active());
  if (!span) {
    return {};
  }

  const spanContext = span.spanContext();
  return {
    traceId: spanContext.traceId,
    spanId: spanContext.spanId,
  };
};

/**
 * Creates a Pino logger that adds OpenTelemetry trace context fields (`traceId`, `spanId`).
 *
 * Calls intercepted inside an active span log with that span's ids, so proxy
 * diagnostics line up with the caller's trace.
 */
export function createPinoLogger(options: CreatePinoLoggerOptions): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level,
    mixin: traceContextMixin,
    ...(options.base !== undefined ? { base: options.base } : {}),
    ...(options.serializers ? { serializers: options.serializers } : {}),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
