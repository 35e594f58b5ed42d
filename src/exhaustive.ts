/**
 * Compile-time exhaustive check for discriminated unions.
 * Use as the default case in switch statements.
 */
export function assertNever(x: never): never {
    throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
