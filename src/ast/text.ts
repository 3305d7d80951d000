import type { Token } from './types';

// Join token texts, keeping a single space wherever the source had whitespace between them.
export function renderTokens(tokens: readonly Token[]): string {
	let out = '';
	let prevEnd = -1;
	for (const t of tokens) {
		if (out.length > 0 && t.span.start > prevEnd) out += ' ';
		out += t.text;
		prevEnd = t.span.end;
	}
	return out;
}

const OPENERS: Readonly<Record<string, string>> = { '(': ')', '[': ']', '{': '}' };

/** Split a token run at top-level occurrences of `sep` (outside (), [] and {}). */
export function splitTopLevel(tokens: readonly Token[], sep: string): Token[][] {
	const groups: Token[][] = [];
	let current: Token[] = [];
	const stack: string[] = [];
	for (const t of tokens) {
		if (t.kind === 'punctuation') {
			const closer = OPENERS[t.text];
			if (closer) stack.push(closer);
			else if (stack.length > 0 && stack[stack.length - 1] === t.text) stack.pop();
			else if (stack.length === 0 && t.text === sep) { groups.push(current); current = []; continue; }
		}
		current.push(t);
	}
	groups.push(current);
	return groups;
}

export function isPunct(t: Token | undefined, text: string): boolean {
	return !!t && t.kind === 'punctuation' && t.text === text;
}
