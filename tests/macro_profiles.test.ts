import { describe, it, expect } from 'vitest';
import { loadMacroTable, parseMacroProfile, profileToTable } from '../src/config';
import { DEFAULT_MACRO_TABLE } from '../src/ast/macros';
import { classAt, fixturePath, functions, membersOf, parseFixture } from './testUtils';

describe('macro profiles', () => {
	it('loads the bundled Qt profile on top of the Unreal defaults', async () => {
		const table = await loadMacroTable('qt');
		expect(table.get('Q_OBJECT')?.placement).toBe('body');
		expect(table.get('Q_INVOKABLE')?.placement).toBe('declaration');
		expect(table.has('UPROPERTY')).toBe(true);
		expect(table.size).toBe(DEFAULT_MACRO_TABLE.size + 10);
	});

	it('parses a Qt class with the Qt profile', async () => {
		const macroTable = await loadMacroTable('qt');
		const { tree, diagnostics, includes } = await parseFixture('cpp/qt_counter.h', { macroTable });
		expect(diagnostics).toEqual([]);
		expect(includes.map(i => [i.path, i.isSystem])).toEqual([['QObject', true]]);
		const cls = classAt(tree.children, 'Counter');
		expect(cls.attributes.map(a => [a.name, a.hasParentheses, a.rawArguments])).toEqual([
			['Q_OBJECT', false, []],
			['Q_PROPERTY', true, ['int value READ value WRITE setValue NOTIFY valueChanged']],
		]);
		expect(cls.members.map(m => [m.access, m.declaration.name])).toEqual([
			['public', 'Counter'],
			['public', 'value'],
			['public', 'setValue'],
			['public', 'valueChanged'],
			['private', 'm_value'],
		]);
		const [ctor, value] = functions(membersOf(cls));
		expect(ctor?.role).toBe('constructor');
		expect(ctor?.parameters).toEqual([{ name: 'parent', type: 'QObject*', defaultValue: 'nullptr', attributes: [] }]);
		expect(value?.attributes.map(a => a.name)).toEqual(['Q_INVOKABLE']);
		expect(value?.qualifiers).toEqual(['const']);
	});

	it('starts from an empty table with extends: none', async () => {
		const table = await loadMacroTable(fixturePath('profiles/custom.yaml'));
		expect([...table.keys()]).toEqual(['MY_REFLECT', 'MY_BODY']);
		expect(table.get('MY_BODY')?.placement).toBe('body');
		expect(table.get('MY_REFLECT')?.placement).toBe('declaration');
	});

	it('rejects profiles that fail the schema', async () => {
		await expect(loadMacroTable(fixturePath('profiles/invalid.yaml'))).rejects.toThrow(/failed schema validation/);
	});

	it('rejects files that are not YAML', async () => {
		await expect(loadMacroTable(fixturePath('profiles/broken.yaml'))).rejects.toThrow(/is not valid YAML/);
	});

	it('rejects a profile name that resolves to no file', async () => {
		await expect(loadMacroTable('no-such-profile')).rejects.toThrow();
	});

	it('validates inline profile objects', () => {
		expect(() => parseMacroProfile(null)).toThrow(/appears to be empty/);
		expect(() => parseMacroProfile({ macros: ['has space'] })).toThrow(/failed schema validation/);
		expect(() => parseMacroProfile({ macros: [], colour: 'red' })).toThrow(/failed schema validation/);
		expect(parseMacroProfile({ name: 'ok', macros: ['MY_MACRO'] })).toEqual({ name: 'ok', macros: ['MY_MACRO'] });
	});

	it('turns profile entries into table specs', () => {
		const table = profileToTable({ macros: ['A_B', { name: 'C_D', placement: 'trailing' }] });
		expect(table.size).toBe(DEFAULT_MACRO_TABLE.size + 2);
		expect(table.get('A_B')?.placement).toBe('declaration');
		expect(table.get('C_D')?.placement).toBe('trailing');
		expect(profileToTable({ extends: 'none', macros: ['ONLY'] }).size).toBe(1);
	});
});
