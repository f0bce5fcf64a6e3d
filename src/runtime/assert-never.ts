/**
 * Exhaustiveness helper for discriminated unions and closed literal sets.
 * Put it in the `default` branch so adding a union member fails to compile.
 */
export function assertNever(x: never, context = 'value'): never {
  throw new Error(`Unexpected ${context}: ${JSON.stringify(x)}`);
}
