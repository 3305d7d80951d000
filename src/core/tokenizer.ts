import { type RawToken, TokenStream } from './tokens';

const THREE = new Set(['<<=', '>>=', '...', '->*', '<=>']);
const TWO = new Set([
	'::', '->', '.*', '==', '!=', '<=', '>=', '&&', '||', '<<', '>>',
	'+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '++', '--', '##',
]);
const SINGLE = new Set(['+', '-', '*', '/', '%', '!', '~', '<', '>', '=', '&', '|', '^', '.', '?']);
const PUNCT = new Set([';', ',', '(', ')', '{', '}', '[', ']', ':']);
// encoding prefixes that may glue onto a string literal: L"..", u8R"(..)"
const STRING_PREFIXES = new Set(['L', 'u', 'U', 'u8', 'R', 'LR', 'uR', 'UR', 'u8R']);

const isIdStart = (ch: string | undefined) => !!ch && /[A-Za-z_]/.test(ch);
const isIdContinue = (ch: string | undefined) => !!ch && /[A-Za-z0-9_]/.test(ch);
const isDigit = (ch: string | undefined) => !!ch && /[0-9]/.test(ch);

// Standalone tokenizer: consumes whitespace and line continuations, emits
// comments and directives as tokens, but does NOT expand or evaluate macros.
export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly file?: string;
	private readonly ts: TokenStream;

	constructor(text: string, file?: string) {
		this.text = text;
		this.n = text.length;
		this.file = file;
		this.ts = new TokenStream({ producer: () => this.scanOne() });
	}

	next(): RawToken { return this.ts.next(); }
	peek(): RawToken { return this.ts.peek(); }
	pushBack(t: RawToken) { this.ts.pushBack(t); }

	private ch(at: number): string | undefined { return at < this.n ? this.text[at] : undefined; }

	private scanOne(): RawToken {
		// skip whitespace and splice line continuations
		while (this.i < this.n) {
			const c = this.ch(this.i);
			if (c === '\\') {
				const k = this.continuationEnd(this.i);
				if (k > 0) { this.i = k; continue; }
			}
			if (c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f' || c === '\v') { this.i++; continue; }
			break;
		}
		const c = this.ch(this.i);
		if (c === undefined) return this.mk('eof', '', this.i, this.i);

		// preprocessor directive at start of line (allow indentation). Build the token value
		// while removing continuation backslashes and inserting a single '\n' per splice.
		if (c === '#' && this.atLineStart(this.i)) {
			let j = this.i + 1;
			let segStart = this.i;
			let acc = '';
			while (j < this.n) {
				const d = this.ch(j);
				if (d === '\\') {
					const k = this.continuationEnd(j);
					if (k > 0) { acc += this.text.slice(segStart, j) + '\n'; j = k; segStart = j; continue; }
				}
				if (d === '\n') break;
				// a block comment may run past the end of the line; keep it inside the directive
				if (d === '/' && this.ch(j + 1) === '*') {
					const close = this.text.indexOf('*/', j + 2);
					j = close < 0 ? this.n : close + 2;
					continue;
				}
				if (d === '/' && this.ch(j + 1) === '/') { j = this.findLineEnd(j); break; }
				j++;
			}
			acc += this.text.slice(segStart, j);
			const t = this.mk('directive', acc.replace(/\r$/, ''), this.i, j);
			this.i = j;
			return t;
		}

		// comments
		if (c === '/') {
			const d = this.ch(this.i + 1);
			if (d === '/') {
				const s = this.i; const e = this.findLineEnd(this.i + 2);
				this.i = e;
				return this.mk('comment-line', this.text.slice(s, e).replace(/\r$/, ''), s, e);
			}
			if (d === '*') {
				const s = this.i;
				const close = this.text.indexOf('*/', s + 2);
				const e = close < 0 ? this.n : close + 2;
				this.i = e;
				return this.mk('comment-block', this.text.slice(s, e), s, e);
			}
		}

		if (c === '"') return this.scanQuoted(this.i, this.i, 'string');
		if (c === '\'') return this.scanQuoted(this.i, this.i, 'char');

		if (isDigit(c) || (c === '.' && isDigit(this.ch(this.i + 1)))) return this.scanNumber();

		if (isIdStart(c)) {
			const s = this.i;
			let k = s + 1;
			while (k < this.n && isIdContinue(this.ch(k))) k++;
			const word = this.text.slice(s, k);
			const after = this.ch(k);
			if (STRING_PREFIXES.has(word) && (after === '"' || after === '\'')) {
				if (word.endsWith('R') && after === '"') return this.scanRawString(s, k);
				return this.scanQuoted(s, k, after === '"' ? 'string' : 'char');
			}
			this.i = k;
			return this.mk('word', word, s, k);
		}

		// operators and punctuation
		const three = this.text.slice(this.i, this.i + 3);
		if (THREE.has(three)) { const t = this.mk('op', three, this.i, this.i + 3); this.i += 3; return t; }
		const two = this.text.slice(this.i, this.i + 2);
		if (TWO.has(two)) { const t = this.mk('op', two, this.i, this.i + 2); this.i += 2; return t; }
		if (SINGLE.has(c)) { const t = this.mk('op', c, this.i, this.i + 1); this.i++; return t; }
		if (PUNCT.has(c)) { const t = this.mk('punct', c, this.i, this.i + 1); this.i++; return t; }

		// unknown char -> emit as punct to keep stream progressing
		const t = this.mk('punct', c, this.i, this.i + 1);
		this.i++;
		return t;
	}

	// `quoteAt` points at the opening quote; `start` includes any encoding prefix
	private scanQuoted(start: number, quoteAt: number, kind: 'string' | 'char'): RawToken {
		const q = this.ch(quoteAt);
		let j = quoteAt + 1;
		while (j < this.n) {
			const ch = this.ch(j);
			if (ch === '\\') { j += 2; continue; }
			if (ch === q) { j++; break; }
			if (ch === '\n') break; // unterminated literal stops at end of line
			j++;
		}
		j = this.consumeSuffix(Math.min(j, this.n));
		this.i = j;
		return this.mk(kind, this.text.slice(start, j), start, j);
	}

	// R"delim( ... )delim"
	private scanRawString(start: number, quoteAt: number): RawToken {
		const open = this.text.indexOf('(', quoteAt + 1);
		const delim = open < 0 ? '' : this.text.slice(quoteAt + 1, open);
		const terminator = `)${delim}"`;
		const close = open < 0 ? -1 : this.text.indexOf(terminator, open + 1);
		const j = this.consumeSuffix(close < 0 ? this.n : close + terminator.length);
		this.i = j;
		return this.mk('string', this.text.slice(start, j), start, j);
	}

	private scanNumber(): RawToken {
		const s = this.i;
		let j = this.i;
		const prefix = this.text.slice(j, j + 2).toLowerCase();
		if (prefix === '0x' || prefix === '0b') {
			j += 2;
			while (j < this.n && /[0-9A-Fa-f'.]/.test(this.text.charAt(j))) j++;
			if (/[pP]/.test(this.text.charAt(j))) { j++; if (/[+-]/.test(this.text.charAt(j))) j++; while (isDigit(this.ch(j))) j++; }
		} else {
			while (j < this.n) {
				const ch = this.text.charAt(j);
				// digit separators: 1'000'000
				if (isDigit(ch) || ch === '.' || (ch === '\'' && isDigit(this.ch(j + 1)))) { j++; continue; }
				break;
			}
			if (/[eE]/.test(this.text.charAt(j))) { j++; if (/[+-]/.test(this.text.charAt(j))) j++; while (isDigit(this.ch(j))) j++; }
		}
		j = this.consumeSuffix(j);
		this.i = j;
		return this.mk('number', this.text.slice(s, j), s, j);
	}

	// literal suffixes: 10ull, 1.0f, "abc"s, 12_km
	private consumeSuffix(j: number): number {
		let k = j;
		while (k < this.n && isIdContinue(this.ch(k))) k++;
		return k;
	}

	// Returns the offset after a backslash-newline splice starting at `at`, or 0 when there is none.
	private continuationEnd(at: number): number {
		let k = at + 1;
		while (k < this.n && (this.ch(k) === ' ' || this.ch(k) === '\t')) k++;
		if (this.ch(k) === '\n') return k + 1;
		if (this.ch(k) === '\r' && this.ch(k + 1) === '\n') return k + 2;
		return 0;
	}

	private atLineStart(pos: number): boolean {
		let j = pos - 1;
		while (j >= 0 && (this.text[j] === ' ' || this.text[j] === '\t')) j--;
		return j < 0 || this.text[j] === '\n';
	}

	private findLineEnd(pos: number): number { let i = pos; while (i < this.n && this.text[i] !== '\n') i++; return i; }
	private mk(kind: RawToken['kind'], value: string, start: number, end: number): RawToken { return { kind, value, span: { start, end }, file: this.file }; }
}

export function tokenize(text: string, file?: string): RawToken[] {
	const tz = new Tokenizer(text, file);
	const out: RawToken[] = [];
	for (; ;) { const t = tz.next(); out.push(t); if (t.kind === 'eof') break; }
	return out;
}
