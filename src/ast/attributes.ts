import type { TokenCursor } from './cursor';
import type { MacroPlacement, MacroTable } from './macros';
import type { Recovery } from './recovery';
import { renderTokens, splitTopLevel } from './text';
import type { Attribute, Token } from './types';

export interface CollectedAttributes {
	// attach to the declaration that follows
	declaration: Attribute[];
	// attach to the enclosing scope
	body: Attribute[];
}

export function isMacroToken(t: Token): boolean {
	return t.kind === 'macro-name' || t.kind === 'unknown-macro';
}

/**
 * Captures reflection-macro call sites (`UPROPERTY(EditAnywhere)`, `GENERATED_BODY()`,
 * `Q_OBJECT`) as opaque attributes. Arguments are kept as text and never interpreted.
 */
export class AttributeRecognizer {
	constructor(
		private readonly cur: TokenCursor,
		private readonly recovery: Recovery,
		private readonly table: MacroTable,
	) { }

	placementOf(name: string): MacroPlacement {
		return this.table.get(name)?.placement ?? 'declaration';
	}

	/**
	 * Collect every consecutive macro call site at the cursor, in source order.
	 * Stops before `ctorName`, the enclosing class's constructor (`struct RGB { RGB(int); };`).
	 */
	collect(ctorName?: string): CollectedAttributes {
		const out: CollectedAttributes = { declaration: [], body: [] };
		for (; ;) {
			const t = this.cur.peek();
			if (!isMacroToken(t) || (t.kind === 'unknown-macro' && t.text === ctorName)) break;
			const attr = this.captureOne();
			if (!attr) continue;
			if (this.placementOf(attr.name) === 'body') out.body.push(attr);
			else out.declaration.push(attr);
		}
		return out;
	}

	/** Collect trailing macros (e.g. `UMETA(...)` after an enumerator). */
	collectTrailing(): Attribute[] {
		const out: Attribute[] = [];
		while (isMacroToken(this.cur.peek())) {
			const attr = this.captureOne();
			if (attr) out.push(attr);
		}
		return out;
	}

	/**
	 * Capture one macro call. `(` without a matching `)` before the next `;` reports
	 * MacroArgumentMalformed, consumes through that `;` and yields null. With
	 * `allowSemicolons` the argument list may contain `;` (`PURE_VIRTUAL(F, return 0;)`).
	 */
	captureOne(allowSemicolons = false): Attribute | null {
		const nameTok = this.cur.next();
		if (!this.cur.at('(')) {
			return freezeAttribute({ name: nameTok.text, rawArguments: [], tokens: [], hasParentheses: false, span: nameTok.span });
		}
		const close = this.findClose(allowSemicolons);
		if (close < 0) {
			const open = this.cur.peek();
			this.recovery.report('MacroArgumentMalformed', open, `missing ')' to close arguments of ${nameTok.text}`);
			this.skipStatement();
			return null;
		}
		this.cur.next(); // '('
		const inner: Token[] = [];
		for (let i = 1; i < close; i++) inner.push(this.cur.next());
		const closeTok = this.cur.next();
		const rawArguments = inner.length === 0 ? [] : splitTopLevel(inner, ',').map(renderTokens);
		return freezeAttribute({
			name: nameTok.text,
			rawArguments,
			tokens: inner.map(t => t.text),
			hasParentheses: true,
			span: { start: nameTok.span.start, end: closeTok.span.end },
		});
	}

	// lookahead offset of the `)` matching the `(` at the cursor, or -1
	private findClose(allowSemicolons: boolean): number {
		let depth = 0;
		for (let k = 0; ; k++) {
			const t = this.cur.peek(k);
			if (t.kind === 'eof') return -1;
			if (t.kind !== 'punctuation') continue;
			if (t.text === '(') depth++;
			else if (t.text === ')') { depth--; if (depth === 0) return k; }
			else if (t.text === ';' && !allowSemicolons) return -1;
			else if (t.text === '}' && depth <= 1 && !allowSemicolons) return -1;
		}
	}

	// consume through the next `;`, stopping before `}` or end of input
	private skipStatement() {
		for (; ;) {
			const t = this.cur.peek();
			if (t.kind === 'eof' || (t.kind === 'punctuation' && t.text === '}')) return;
			this.cur.next();
			if (t.kind === 'punctuation' && t.text === ';') return;
		}
	}
}

function freezeAttribute(a: Attribute): Attribute {
	Object.freeze(a.rawArguments);
	Object.freeze(a.tokens);
	Object.freeze(a.span);
	return Object.freeze(a);
}
