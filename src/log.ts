// Debug tracing, enabled with CPP_DECL_DEBUG=1. The extractor is silent otherwise.

function enabled(): boolean {
	return typeof process !== 'undefined' && !!process.env.CPP_DECL_DEBUG;
}

export function debugLog(scope: string, ...args: unknown[]): void {
	if (!enabled()) return;
	console.log(`[cpp-decl] ${scope}`, ...args);
}
