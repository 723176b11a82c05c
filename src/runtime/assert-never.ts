/**
 * Exhaustiveness helper for discriminated unions.
 * Place in the `default` branch of a `switch` so adding a union member breaks the build.
 */
export function assertNever(x: never): never {
  throw new Error(`Unhandled union member: ${JSON.stringify(x)}`);
}
