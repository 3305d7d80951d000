import { type Diagnostic, type ErrorKind, ERROR_KIND_INFO } from '../analysisTypes';
import { debugLog } from '../log';
import type { TokenCursor } from './cursor';
import type { Span, Token } from './types';

/** Thrown by the declaration parser; the enclosing scope loop turns it into a diagnostic. */
export class ParseError extends Error {
	readonly kind: ErrorKind;
	readonly span: Span;
	readonly fatal: boolean;

	constructor(kind: ErrorKind, at: Token | Span, message: string, fatal = false) {
		super(message);
		this.name = 'ParseError';
		this.kind = kind;
		this.span = 'span' in at ? at.span : at;
		this.fatal = fatal;
	}
}

function isAccessLabel(cur: TokenCursor): boolean {
	const t = cur.peek();
	return t.kind === 'keyword' && (t.text === 'public' || t.text === 'protected' || t.text === 'private') && cur.at(':', 1);
}

export class Recovery {
	private readonly diags: Diagnostic[] = [];
	private stopped = false;

	get diagnostics(): readonly Diagnostic[] { return this.diags; }

	// true once parsing must stop (fatal error or cancellation)
	get halted(): boolean { return this.stopped; }

	report(kind: ErrorKind, at: Token | Span, message: string, fatal = false) {
		const span = 'span' in at ? at.span : at;
		const info = ERROR_KIND_INFO[kind];
		const diag: Diagnostic = fatal
			? { span, message, severity: info.severity, code: info.code, kind, fatal: true }
			: { span, message, severity: info.severity, code: info.code, kind };
		this.diags.push(Object.freeze(diag));
		debugLog('diagnostic', `${info.code} ${kind}@${span.start}-${span.end}: ${message}`);
		if (fatal) this.stopped = true;
	}

	fail(e: ParseError) {
		this.report(e.kind, e.span, e.message, e.fatal);
	}

	halt() { this.stopped = true; }

	/**
	 * Skip the rest of a malformed construct: up to and including the next `;` at the
	 * current depth, or past one balanced `{...}` block (and a `;` right after it).
	 * Stops before a `}` that closes the enclosing scope, and before an access label
	 * once at least one token was skipped. End of input inside a block is fatal.
	 */
	synchronize(cur: TokenCursor) {
		const startMark = cur.mark();
		let depth = 0;
		for (; ;) {
			const t = cur.peek();
			if (t.kind === 'eof') return;
			const progressed = cur.mark() !== startMark;
			if (t.kind === 'punctuation') {
				if (t.text === '}' && depth === 0) return;
				if (t.text === ';') { cur.next(); return; }
				if (t.text === '{' && depth === 0) {
					const block = cur.skipBalanced('{', '}');
					if (!block.closed) {
						this.report('UnbalancedDelimiter', block.span, "missing '}' to close block", true);
						return;
					}
					cur.maybe(';');
					return;
				}
				if (t.text === '(' || t.text === '[' || t.text === '{') depth++;
				else if ((t.text === ')' || t.text === ']' || t.text === '}') && depth > 0) depth--;
			}
			if (progressed && depth === 0 && isAccessLabel(cur)) return;
			cur.next();
		}
	}
}
