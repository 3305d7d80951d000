import type { RawToken } from '../core/tokens';
import keywordList from '../../common/cppKeywords.json';
import { type MacroTable, DEFAULT_MACRO_TABLE, isMacroShaped } from './macros';
import type { Token, TokenRole } from './types';

const KEYWORDS: ReadonlySet<string> = new Set(keywordList.keywords);

// Builtin type keywords that may start a type expression
const TYPE_KEYWORDS: ReadonlySet<string> = new Set([
	'void', 'bool', 'char', 'char8_t', 'char16_t', 'char32_t', 'wchar_t', 'short', 'int', 'long',
	'float', 'double', 'signed', 'unsigned', 'auto', 'decltype',
]);

export function isKeyword(word: string): boolean {
	return KEYWORDS.has(word);
}

export function isTypeKeyword(word: string): boolean {
	return TYPE_KEYWORDS.has(word);
}

/**
 * Role of one raw token, decided from the token itself and the significant token after it.
 * Table macros are `macro-name`; other ALL_CAPS words directly followed by `(` are
 * `unknown-macro` so the parser can skip them as annotations.
 */
export function classifyToken(raw: RawToken, next: RawToken | undefined, table: MacroTable = DEFAULT_MACRO_TABLE): TokenRole {
	switch (raw.kind) {
		case 'word': {
			if (KEYWORDS.has(raw.value)) return 'keyword';
			if (table.has(raw.value)) return 'macro-name';
			const opensArgs = !!next && next.kind === 'punct' && next.value === '(';
			if (opensArgs && isMacroShaped(raw.value)) return 'unknown-macro';
			return 'identifier';
		}
		case 'number':
		case 'string':
		case 'char':
			return 'literal';
		case 'op':
		case 'punct':
			return 'punctuation';
		case 'comment-line':
		case 'comment-block':
			return 'comment';
		case 'directive':
			return 'directive';
		case 'eof':
			return 'eof';
	}
}

// Classify a whole stream; comments and directives are kept, and lookahead skips them.
export function classifyTokens(raw: readonly RawToken[], table: MacroTable = DEFAULT_MACRO_TABLE): Token[] {
	// walk backwards so `next` is always the closest significant token after `t`
	const roles: TokenRole[] = new Array<TokenRole>(raw.length);
	let next: RawToken | undefined;
	for (let i = raw.length - 1; i >= 0; i--) {
		const t = raw[i];
		if (!t) continue;
		roles[i] = classifyToken(t, next, table);
		if (!isTrivia(t)) next = t;
	}
	const out: Token[] = raw.map((t, i) => Object.freeze({ kind: roles[i] ?? 'punctuation', text: t.value, span: Object.freeze({ ...t.span }) }));
	const last = out[out.length - 1];
	if (!last || last.kind !== 'eof') {
		const end = last ? last.span.end : 0;
		out.push(Object.freeze({ kind: 'eof', text: '', span: Object.freeze({ start: end, end }) }));
	}
	return out;
}

function isTrivia(t: RawToken): boolean {
	return t.kind === 'comment-line' || t.kind === 'comment-block' || t.kind === 'directive';
}
