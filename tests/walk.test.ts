import { describe, it, expect } from 'vitest';
import { findDeclaration, flattenSymbols, walkDeclarations } from '../src/ast/walk';
import { parseSource } from '../src/ast/parser';
import { parseFixture } from './testUtils';

describe('symbol tree walking', () => {
	it('flattens a header into qualified names in source order', async () => {
		const { tree } = await parseFixture('cpp/simple_class.h');
		expect(flattenSymbols(tree).map(s => s.qualifiedName)).toEqual([
			'MyNamespace',
			'MyNamespace::SimpleClass',
			'MyNamespace::SimpleClass::SimpleClass',
			'MyNamespace::SimpleClass::SimpleClass',
			'MyNamespace::SimpleClass::~SimpleClass',
			'MyNamespace::SimpleClass::getValue',
			'MyNamespace::SimpleClass::setValue',
			'MyNamespace::SimpleClass::process',
			'MyNamespace::SimpleClass::create',
			'MyNamespace::SimpleClass::m_value',
			'MyNamespace::SimpleClass::m_label',
			'MyNamespace::SimpleClass::internalHelper',
			'MyNamespace::helperFunction',
			'MyNamespace::Container',
			'MyNamespace::Container::add',
			'MyNamespace::Container::get',
			'MyNamespace::Container::m_items',
		]);
	});

	it('links template bodies back to their Template node', async () => {
		const { tree } = await parseFixture('cpp/simple_class.h');
		const container = flattenSymbols(tree).find(s => s.qualifiedName === 'MyNamespace::Container');
		expect(container?.declaration.kind).toBe('Class');
		expect(container?.template?.kind).toBe('Template');
		const add = flattenSymbols(tree).find(s => s.qualifiedName === 'MyNamespace::Container::add');
		expect(add?.template).toBeUndefined();
	});

	it('includes the qualifier of out-of-line definitions', () => {
		const { tree } = parseSource('namespace N { void A::B::run() {} }\ntemplate<> struct Box<int> { int v; };');
		expect(flattenSymbols(tree).map(s => s.qualifiedName)).toEqual(['N', 'N::A::B::run', 'Box', 'Box<int>::v']);
	});

	it('finds declarations by full or trailing qualified name', async () => {
		const { tree } = await parseFixture('cpp/simple_class.h');
		expect(findDeclaration(tree, 'MyNamespace::SimpleClass::getValue').map(d => d.kind)).toEqual(['Function']);
		expect(findDeclaration(tree, 'SimpleClass::SimpleClass')).toHaveLength(2);
		expect(findDeclaration(tree, 'm_items').map(d => d.name)).toEqual(['m_items']);
		expect(findDeclaration(tree, ' SimpleClass :: create ').map(d => d.name)).toEqual(['create']);
		expect(findDeclaration(tree, 'Class::create')).toEqual([]);
	});

	it('walks pre-order and lets the visitor skip children', async () => {
		const { tree } = await parseFixture('cpp/simple_class.h');
		const seen: string[] = [];
		walkDeclarations(tree, (decl, ctx) => {
			seen.push(`${ctx.depth}:${decl.kind}:${decl.name}`);
			return decl.kind !== 'Class';
		});
		expect(seen).toEqual([
			'0:Namespace:',
			'1:Namespace:MyNamespace',
			'2:Class:SimpleClass',
			'2:Function:helperFunction',
			'2:Template:Container',
			'3:Class:Container',
		]);
	});
});
