// Small shared utilities

/**
 * Compile-time exhaustiveness helper. Reaching it at runtime means a declaration kind
 * was added without updating a switch, so it throws.
 */
export function AssertNever(x: never, message?: string): never {
	throw new Error(message ?? `Unexpected value in AssertNever: ${JSON.stringify(x)}`);
}
