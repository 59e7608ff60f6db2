export type CallBindingErrorCode =
  | 'not_callable'
  | 'missing_receiver'
  | 'ambiguous_binding'
  | 'not_bindable';

export type CallBindingError = Error & { code: CallBindingErrorCode };

export function createCallBindingError(
  code: CallBindingErrorCode,
  detail?: string,
): CallBindingError {
  const message = detail ? `call_binding.${code}:${detail}` : `call_binding.${code}`;
  return Object.assign(new Error(message), { code });
}

export function isCallBindingError(error: unknown): error is CallBindingError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof (error as { code?: unknown }).code === 'string' &&
    error.message.startsWith('call_binding.')
  );
}
