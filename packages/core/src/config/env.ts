export type Env = Record<string, string | undefined>;

export type ReadEnumEnvOptions = {
  /** Match values case-insensitively against the allowed list (default: true). */
  ignoreCase?: boolean;
  /**
   * - "fallback" (default): ignore values outside the allowed list and continue to next key; if none are valid, return fallback.
   * - "throw": throw an Error if a non-empty value is present but not allowed.
   */
  onInvalid?: 'fallback' | 'throw';
};

function asKeyList(keys: readonly string[] | string): readonly string[] {
  return typeof keys === 'string' ? [keys] : keys;
}

export function readEnumEnv<TValue extends string>(
  env: Env,
  keys: readonly string[] | string,
  allowed: readonly TValue[],
  fallback: TValue,
  options: ReadEnumEnvOptions = {},
): TValue {
  const keyList = asKeyList(keys);
  const onInvalid = options.onInvalid ?? 'fallback';
  const ignoreCase = options.ignoreCase ?? true;

  for (const key of keyList) {
    const raw = env[key];
    if (raw === undefined) {
      continue;
    }

    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      continue;
    }

    const candidate = ignoreCase ? trimmed.toLowerCase() : trimmed;
    const match = allowed.find((value) =>
      ignoreCase ? value.toLowerCase() === candidate : value === candidate,
    );
    if (match === undefined) {
      if (onInvalid === 'throw') {
        throw new Error(`${key} must be one of ${allowed.join(', ')} (got "${trimmed}")`);
      }
      continue;
    }

    return match;
  }

  return fallback;
}
