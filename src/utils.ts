// Small shared utilities

/**
 * Compile-time exhaustiveness helper. Reaching it at runtime means a tagged union
 * grew a member that a switch was not updated for.
 */
export function AssertNever(x: never, message?: string): never {
	throw new Error(message ?? `Unexpected value in AssertNever: ${JSON.stringify(x)}`);
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}
