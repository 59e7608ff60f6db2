/**
 * Asserts that a value is of type `never`, indicating exhaustive handling of a union.
 * Reaching it at runtime means a variant was added without a matching case.
 *
 * @example
 * ```ts
 * switch (binding) {
 *   case 'instance':
 *     return shift();
 *   // ...
 *   default:
 *     return assertNever(binding);
 * }
 * ```
 */
export function assertNever(value: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(value)}`);
}
