// Raw token model produced by the tokenizer

export type Span = { start: number; end: number };

export type RawTokenKind =
	| 'word'
	| 'number'
	| 'string'
	| 'char'
	| 'op'
	| 'punct'
	| 'comment-line'
	| 'comment-block'
	| 'directive' // entire preprocessor directive line (combined with continuations)
	| 'eof';

export interface RawToken {
	kind: RawTokenKind;
	value: string;
	span: Span;
	file?: string;
}

export class TokenStream {
	private readonly producer: () => RawToken;
	private pushback: RawToken[] = [];
	private stickyEof: RawToken | null = null;

	constructor(source: { producer: () => RawToken }) {
		this.producer = source.producer;
	}

	next(): RawToken {
		if (this.stickyEof) {
			return this.stickyEof;
		}
		const back = this.pushback.pop();
		if (back) return back;
		const t = this.producer();
		if (t.kind === 'eof') {
			this.stickyEof = t;
			return t;
		}
		return t;
	}

	peek(): RawToken {
		const t = this.next();
		if (t.kind !== 'eof') this.pushBack(t);
		return t;
	}

	pushBack(t: RawToken) {
		if (t.kind === 'eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}
}
