/**
 * Exhaustiveness helper for discriminated unions.
 * Place in the `default` branch of a `switch` so adding a union member breaks the build.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
