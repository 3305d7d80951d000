import { describe, it, expect } from 'vitest';
import { classifyToken, classifyTokens, isKeyword } from '../src/ast/classifier';
import { createMacroTable, isMacroShaped } from '../src/ast/macros';
import { tokenize } from '../src/core/tokenizer';

const roles = (src: string, table = createMacroTable()) =>
	classifyTokens(tokenize(src), table).map(t => `${t.text}:${t.kind}`);

describe('token classifier', () => {
	it('separates table macros, unknown macros and identifiers', () => {
		expect(roles('UPROPERTY(x) FOO(1) BAR baz')).toEqual([
			'UPROPERTY:macro-name', '(:punctuation', 'x:identifier', '):punctuation',
			'FOO:unknown-macro', '(:punctuation', '1:literal', '):punctuation',
			'BAR:identifier', 'baz:identifier', ':eof',
		]);
	});

	it('recognises a table macro without an argument list', () => {
		expect(roles('GENERATED_BODY int')).toEqual(['GENERATED_BODY:macro-name', 'int:keyword', ':eof']);
	});

	it('looks past comments when deciding whether a ( follows', () => {
		expect(roles('CHECK /* why */ (a)')[0]).toBe('CHECK:unknown-macro');
		expect(roles('CHECK /* why */ (a)')[1]).toBe('/* why */:comment');
	});

	it('treats contextual words as identifiers', () => {
		expect(roles('override final signals')).toEqual(['override:identifier', 'final:identifier', 'signals:identifier', ':eof']);
		expect(isKeyword('class')).toBe(true);
		expect(isKeyword('override')).toBe(false);
	});

	it('uses a caller-supplied table', () => {
		const table = createMacroTable(['Q_OBJECT']);
		expect(roles('Q_OBJECT', table)[0]).toBe('Q_OBJECT:macro-name');
		expect(roles('Q_OBJECT')[0]).toBe('Q_OBJECT:identifier');
	});

	it('classifies a single token from its successor only', () => {
		const [name, paren] = tokenize('LOG(');
		if (!name || !paren) throw new Error('tokenizer produced too few tokens');
		expect(classifyToken(name, paren)).toBe('unknown-macro');
		expect(classifyToken(name, undefined)).toBe('identifier');
	});

	it('requires at least two characters and one letter for macro shape', () => {
		expect(isMacroShaped('X')).toBe(false);
		expect(isMacroShaped('__')).toBe(false);
		expect(isMacroShaped('UE_LOG')).toBe(true);
		expect(isMacroShaped('Ue_Log')).toBe(false);
	});

	it('appends an eof token when the input has none', () => {
		const out = classifyTokens([{ kind: 'word', value: 'x', span: { start: 0, end: 1 } }]);
		expect(out.map(t => t.kind)).toEqual(['identifier', 'eof']);
		expect(Object.isFrozen(out[0])).toBe(true);
	});
});
