import type { Span, Token } from './types';

/**
 * Cursor over a classified token stream. Comments and directives are hidden from
 * `peek`/`next`; comments stay reachable through `leadingComment()`.
 */
export class TokenCursor {
	private readonly sig: Token[] = [];
	// comment tokens sitting between sig[i - 1] and sig[i]
	private readonly comments: Token[][] = [];
	private readonly eof: Token;
	private pos = 0;
	private lastEnd = 0;

	constructor(tokens: readonly Token[]) {
		let pending: Token[] = [];
		let eof: Token | undefined;
		for (const t of tokens) {
			if (t.kind === 'comment') { pending.push(t); continue; }
			if (t.kind === 'directive') { pending = []; continue; }
			if (t.kind === 'eof') { eof = t; break; }
			this.sig.push(t);
			this.comments.push(pending);
			pending = [];
		}
		const last = this.sig[this.sig.length - 1];
		const end = last ? last.span.end : 0;
		this.eof = eof ?? { kind: 'eof', text: '', span: { start: end, end } };
	}

	peek(k = 0): Token {
		return this.sig[this.pos + k] ?? this.eof;
	}

	next(): Token {
		const t = this.peek();
		if (t.kind !== 'eof') {
			this.pos++;
			this.lastEnd = t.span.end;
		}
		return t;
	}

	// punctuation or keyword with the given text
	at(text: string, k = 0): boolean {
		const t = this.peek(k);
		return t.text === text && (t.kind === 'punctuation' || t.kind === 'keyword');
	}

	maybe(text: string): Token | null {
		return this.at(text) ? this.next() : null;
	}

	atEof(): boolean { return this.peek().kind === 'eof'; }

	mark(): number { return this.pos; }

	reset(mark: number) {
		this.pos = mark;
		const prev = this.sig[mark - 1];
		this.lastEnd = prev ? prev.span.end : 0;
	}

	// number of significant tokens consumed so far
	get consumed(): number { return this.pos; }

	// end offset of the last consumed token
	get end(): number { return this.lastEnd; }

	spanFrom(start: number): Span {
		return { start, end: Math.max(this.lastEnd, start + 1) };
	}

	/** Split a `>>` at the cursor into two `>` tokens so template lists can close one level. */
	splitShiftRight(): void {
		const t = this.peek();
		if (t.kind !== 'punctuation' || t.text !== '>>') return;
		const first: Token = { kind: 'punctuation', text: '>', span: { start: t.span.start, end: t.span.start + 1 } };
		const second: Token = { kind: 'punctuation', text: '>', span: { start: t.span.start + 1, end: t.span.end } };
		this.sig.splice(this.pos, 1, first, second);
		this.comments.splice(this.pos, 1, this.comments[this.pos] ?? [], []);
	}

	/**
	 * Consume a balanced group starting at the current `open` token.
	 * Returns whether the group closed before end of input.
	 */
	skipBalanced(open: '(' | '[' | '{', close: ')' | ']' | '}'): { closed: boolean; span: Span } {
		const start = this.peek().span.start;
		let depth = 0;
		for (; ;) {
			const t = this.peek();
			if (t.kind === 'eof') return { closed: false, span: this.spanFrom(start) };
			this.next();
			if (t.kind !== 'punctuation') continue;
			if (t.text === open) depth++;
			else if (t.text === close) {
				depth--;
				if (depth === 0) return { closed: true, span: this.spanFrom(start) };
			}
		}
	}

	// Cleaned text of the comments directly before the current token.
	leadingComment(): string | undefined {
		const list = this.comments[this.pos];
		if (!list || list.length === 0) return undefined;
		const text = list.map(c => cleanComment(c.text)).filter(s => s.length > 0).join('\n');
		return text.length > 0 ? text : undefined;
	}
}

export function cleanComment(raw: string): string {
	if (raw.startsWith('//')) return raw.replace(/^\/\/+!?[ \t]?/, '').trim();
	const body = raw.replace(/^\/\*+!?/, '').replace(/\*+\/$/, '');
	return body
		.split(/\r?\n/)
		.map(line => line.replace(/^[ \t]*\*?[ \t]?/, '').trimEnd())
		.join('\n')
		.trim();
}
