import { describe, it, expect } from 'vitest';
import { parseSource } from '../../src/ast/parser';
import { at, classAt, functions, membersOf, variables } from '../testUtils';

function parseClean(src: string) {
	const r = parseSource(src);
	expect(r.diagnostics).toEqual([]);
	return r.tree;
}

describe('functions', () => {
	it('reads specifiers, deleted and defaulted members, operators and trailing returns', () => {
		const tree = parseClean([
			'struct S {',
			'  virtual void draw() const = 0;',
			'  S(const S&) = delete;',
			'  S& operator=(const S&) = default;',
			'  bool operator==(const S& other) const;',
			'  explicit operator bool() const noexcept;',
			'  auto size() const -> std::size_t;',
			'};',
		].join('\n'));
		const fns = functions(membersOf(classAt(tree.children, 'S')));
		expect(fns.map(f => [f.name, f.role])).toEqual([
			['draw', 'method'],
			['S', 'constructor'],
			['operator=', 'operator'],
			['operator==', 'operator'],
			['operator bool', 'conversion'],
			['size', 'method'],
		]);
		const [draw, copy, assign, eq, conv, size] = fns;
		expect(draw?.qualifiers).toEqual(['virtual', 'const']);
		expect(draw?.specifier).toBe('pure');
		expect(copy?.specifier).toBe('delete');
		expect(copy?.parameters).toEqual([{ name: '', type: 'const S&', attributes: [] }]);
		expect(assign?.specifier).toBe('default');
		expect(assign?.returnType).toBe('S&');
		expect(eq?.parameters.map(p => [p.type, p.name])).toEqual([['const S&', 'other']]);
		expect(conv?.qualifiers).toEqual(['explicit', 'const', 'noexcept']);
		expect(conv?.returnType).toBeUndefined();
		expect(size?.returnType).toBe('auto');
		expect(size?.trailingReturnType).toBe('std::size_t');
	});

	it('marks variadic functions and reads function-pointer and defaulted parameters', () => {
		const tree = parseClean('int printf(const char* fmt, ...);\nvoid on(void (*cb)(int), int n = 0);\nint c_style(void);');
		const [printf, on, cStyle] = functions(tree.children);
		expect(printf?.isVariadic).toBe(true);
		expect(printf?.parameters.map(p => [p.type, p.name])).toEqual([['const char*', 'fmt']]);
		expect(printf?.role).toBe('function');
		expect(on?.parameters).toEqual([
			{ name: 'cb', type: 'void (*)(int)', attributes: [] },
			{ name: 'n', type: 'int', defaultValue: '0', attributes: [] },
		]);
		expect(cStyle?.parameters).toEqual([]);
	});

	it('keeps template arguments in default arguments whole', () => {
		const fn = at(parseClean('void f(TMap<FName, int32> m = TMap<FName, int32>(), int n);').children, 0, 'Function');
		expect(fn.parameters.map(p => [p.name, p.type, p.defaultValue])).toEqual([
			['m', 'TMap<FName, int32>', 'TMap<FName, int32>()'],
			['n', 'int', undefined],
		]);
	});

	// known limitation: inside a parameter list `<` after a name always opens template arguments
	it('reports a comparison in a default argument as an unclosed template list', () => {
		const { tree, diagnostics } = parseSource('void f(bool b = x < y);\nint k;');
		expect(diagnostics.map(d => [d.kind, d.message])).toEqual([['UnbalancedDelimiter', "missing '>' to close template argument list"]]);
		expect(tree.children.map(d => d.name)).toEqual(['k']);
	});

	it('reads T name(args) as a function declaration', () => {
		const fn = at(parseClean('Widget w(5);').children, 0, 'Function');
		expect(fn.name).toBe('w');
		expect(fn.returnType).toBe('Widget');
		expect(fn.isDefinition).toBe(false);
	});

	it('records a body span for definitions', () => {
		const src = 'int twice(int v) { return v * 2; }';
		const fn = at(parseClean(src).children, 0, 'Function');
		expect(fn.isDefinition).toBe(true);
		expect(fn.body && src.slice(fn.body.start, fn.body.end)).toBe('{ return v * 2; }');
	});
});

describe('variables', () => {
	it('reads bit-fields, arrays, static constexpr, multi-declarators and brace initializers', () => {
		const tree = parseClean([
			'struct Flags {',
			'  unsigned a : 3, b : 5;',
			'  int grid[4][4];',
			'  static constexpr int kMax = 8;',
			'  const char* label = "x", *alt;',
			'  mutable int hits{0};',
			'};',
		].join('\n'));
		const vars = variables(membersOf(classAt(tree.children, 'Flags')));
		expect(vars.map(v => [v.name, v.type])).toEqual([
			['a', 'unsigned'],
			['b', 'unsigned'],
			['grid', 'int[4][4]'],
			['kMax', 'int'],
			['label', 'const char*'],
			['alt', 'const char*'],
			['hits', 'int'],
		]);
		expect(vars.map(v => v.bitWidth).slice(0, 2)).toEqual(['3', '5']);
		expect(vars.find(v => v.name === 'kMax')?.qualifiers).toEqual(['static', 'constexpr']);
		expect(vars.find(v => v.name === 'hits')?.qualifiers).toEqual(['mutable']);
		expect(vars.find(v => v.name === 'hits')?.initializer).toBeDefined();
		expect(vars.find(v => v.name === 'alt')?.initializer).toBeUndefined();
	});

	it('splits declarators that share a base type', () => {
		const tree = parseClean('int x = 1, *y, z[2];');
		expect(variables(tree.children).map(v => [v.name, v.type])).toEqual([['x', 'int'], ['y', 'int*'], ['z', 'int[2]']]);
	});

	it('keeps nested template arguments in the type', () => {
		const v = at(parseClean('std::map<int, std::vector<int>> table;').children, 0, 'Variable');
		expect(v.type).toBe('std::map<int, std::vector<int>>');
		expect(v.name).toBe('table');
	});

	it('renders function pointer variables', () => {
		const v = at(parseClean('void (*handler)(int) = nullptr;').children, 0, 'Variable');
		expect([v.name, v.type]).toEqual(['handler', 'void (*)(int)']);
	});

	it('reads elaborated type specifiers as variable and function types', () => {
		const tree = parseClean('struct stat info;\nclass Foo* make();');
		expect(at(tree.children, 0, 'Variable').type).toBe('struct stat');
		expect(at(tree.children, 1, 'Function').returnType).toBe('class Foo*');
	});
});

describe('classes', () => {
	it('reads final, virtual and default-access bases', () => {
		const cls = classAt(parseClean('class D final : public B1, virtual protected B2, B3<int> {};').children, 'D');
		expect(cls.isFinal).toBe(true);
		expect(cls.bases).toEqual([
			{ name: 'B1', access: 'public', explicitAccess: true, isVirtual: false },
			{ name: 'B2', access: 'protected', explicitAccess: true, isVirtual: true },
			{ name: 'B3<int>', access: 'private', explicitAccess: false, isVirtual: false },
		]);
	});

	it('gives struct bases public access by default', () => {
		const cls = classAt(parseClean('struct D : B {};').children, 'D');
		expect(cls.bases).toEqual([{ name: 'B', access: 'public', explicitAccess: false, isVirtual: false }]);
	});

	it('is polymorphic only with a virtual member', () => {
		const tree = parseClean('class P { void f(); };\nclass V { virtual ~V(); };');
		expect(classAt(tree.children, 'P').isPolymorphic).toBe(false);
		const v = classAt(tree.children, 'V');
		expect(v.isPolymorphic).toBe(true);
		expect(functions(membersOf(v)).map(f => [f.name, f.role])).toEqual([['~V', 'destructor']]);
	});

	it('reads ALL_CAPS constructors and destructors of the enclosing class', () => {
		const cls = classAt(parseClean('struct RGB { RGB(int r); explicit RGB(); ~RGB(); int r; };').children, 'RGB');
		expect(cls.attributes).toEqual([]);
		expect(membersOf(cls).map(d => [d.kind, d.name])).toEqual([['Function', 'RGB'], ['Function', 'RGB'], ['Function', '~RGB'], ['Variable', 'r']]);
		expect(functions(membersOf(cls)).map(f => f.role)).toEqual(['constructor', 'constructor', 'destructor']);
		expect(functions(membersOf(cls))[0]?.parameters.map(p => [p.type, p.name])).toEqual([['int', 'r']]);
	});

	it('keeps members after a templated friend class', () => {
		const cls = classAt(parseClean('class C { template<typename U> friend class Other; int kept; };').children, 'C');
		expect(cls.members.map(m => [m.access, m.declaration.name])).toEqual([['private', 'kept']]);
	});

	it('ignores friend classes and applies the class-key default access', () => {
		const cls = classAt(parseClean('class F { friend class G; int v; };').children, 'F');
		expect(cls.members.map(m => [m.access, m.declaration.name])).toEqual([['private', 'v']]);
	});

	it('attaches trailing declarators after an unnamed struct', () => {
		const tree = parseClean('struct { int x; } point, *ptr;');
		expect(tree.children.map(d => [d.kind, d.name])).toEqual([['Class', ''], ['Variable', 'point'], ['Variable', 'ptr']]);
		expect(variables(tree.children).map(v => v.type)).toEqual(['struct', 'struct*']);
	});

	it('records forward declarations as non-definitions', () => {
		const cls = at(parseClean('class Later;').children, 0, 'Class');
		expect(cls.isDefinition).toBe(false);
		expect(cls.members).toEqual([]);
	});
});

describe('templates', () => {
	it('reads type, value and variadic parameters', () => {
		const tpl = at(parseClean('template<typename T, int N = 4, typename... Rest> struct Buffer;').children, 0, 'Template');
		expect(tpl.name).toBe('Buffer');
		expect(tpl.templateParameters).toEqual([
			{ kind: 'type', name: 'T', isVariadic: false },
			{ kind: 'value', name: 'N', type: 'int', defaultValue: '4', isVariadic: false },
			{ kind: 'type', name: 'Rest', isVariadic: true },
		]);
		expect(tpl.declaration.kind).toBe('Class');
	});

	it('reads a typename-qualified type as a value parameter', () => {
		const tpl = at(parseClean('template<typename T, typename T::value_type V> struct X;').children, 0, 'Template');
		expect(tpl.templateParameters).toEqual([
			{ kind: 'type', name: 'T', isVariadic: false },
			{ kind: 'value', name: 'V', type: 'typename T::value_type', isVariadic: false },
		]);
	});

	it('keeps explicit specialization arguments on the class', () => {
		const tpl = at(parseClean('template<> struct Buffer<int, 0> { int data; };').children, 0, 'Template');
		expect(tpl.templateParameters).toEqual([]);
		const cls = tpl.declaration;
		if (cls.kind !== 'Class') throw new Error('expected a class');
		expect(cls.specializationArguments).toBe('<int, 0>');
		expect(cls.sections.public.map(d => d.name)).toEqual(['data']);
	});

	it('collapses consecutive template headers into one node', () => {
		const tpl = at(parseClean('template<typename T> template<typename U> void Outer<T>::convert(U u) {}').children, 0, 'Template');
		expect(tpl.templateParameters.map(p => p.name)).toEqual(['T', 'U']);
		const fn = tpl.declaration;
		if (fn.kind !== 'Function') throw new Error('expected a function');
		expect(fn.scope).toEqual(['Outer<T>']);
		expect(fn.isDefinition).toBe(true);
	});

	it('wraps alias templates', () => {
		const tpl = at(parseClean('template<typename T> using Vec = std::vector<T>;').children, 0, 'Template');
		expect(tpl.declaration).toMatchObject({ kind: 'Alias', name: 'Vec', form: 'using', target: 'std::vector<T>' });
	});
});

describe('enums', () => {
	it('reads unscoped enumerators with expression values', () => {
		const e = at(parseClean('enum Color { Red, Green = 2, Blue = Red << 1 };').children, 0, 'Enum');
		expect(e.isScoped).toBe(false);
		expect(e.enumerators.map(x => [x.name, x.value])).toEqual([['Red', undefined], ['Green', '2'], ['Blue', 'Red << 1']]);
	});

	it('tolerates a trailing comma', () => {
		const e = at(parseClean('enum struct Dir { Up, Down, };').children, 0, 'Enum');
		expect(e.isScoped).toBe(true);
		expect(e.enumerators.map(x => x.name)).toEqual(['Up', 'Down']);
	});

	it('reads forward-declared scoped enums', () => {
		const e = at(parseClean('enum class Mode : uint8_t;').children, 0, 'Enum');
		expect([e.isScoped, e.underlyingType, e.isDefinition]).toEqual([true, 'uint8_t', false]);
	});

	it('declares variables after an anonymous enum', () => {
		const tree = parseClean('enum { A, B } mode;');
		expect(tree.children.map(d => [d.kind, d.name])).toEqual([['Enum', ''], ['Variable', 'mode']]);
		expect(at(tree.children, 1, 'Variable').type).toBe('enum');
	});

	it('separates a trailing UMETA from the enumerator value', () => {
		const e = at(parseClean('UENUM()\nenum class E : uint8 { A = 0 UMETA(Hidden), B UMETA(DisplayName = "Bee") };').children, 0, 'Enum');
		expect(e.attributes.map(a => [a.name, a.hasParentheses, a.rawArguments])).toEqual([['UENUM', true, []]]);
		expect(e.enumerators.map(x => [x.name, x.value, x.attributes.map(a => a.rawArguments)])).toEqual([
			['A', '0', [['Hidden']]],
			['B', undefined, [['DisplayName = "Bee"']]],
		]);
	});
});

describe('namespaces and aliases', () => {
	it('nests a::b::inline c into three namespaces', () => {
		const a = at(parseClean('namespace a::b::inline c { int x; }').children, 0, 'Namespace');
		const b = at(a.children, 0, 'Namespace');
		const c = at(b.children, 0, 'Namespace');
		expect([a.name, b.name, c.name]).toEqual(['a', 'b', 'c']);
		expect([a.isInline, b.isInline, c.isInline]).toEqual([false, false, true]);
		expect(c.children.map(d => d.name)).toEqual(['x']);
	});

	it('reads anonymous and inline namespaces, namespace aliases and linkage blocks', () => {
		const tree = parseClean([
			'namespace { int hidden; }',
			'inline namespace v1 { void f(); }',
			'namespace fs = std::filesystem;',
			'extern "C" { int c_api(void); }',
		].join('\n'));
		expect(tree.children.map(d => [d.kind, d.name])).toEqual([
			['Namespace', ''],
			['Namespace', 'v1'],
			['Alias', 'fs'],
			['Function', 'c_api'],
		]);
		expect(at(tree.children, 1, 'Namespace').isInline).toBe(true);
		expect(at(tree.children, 2, 'Alias')).toMatchObject({ form: 'namespace', target: 'std::filesystem' });
	});

	it('reads using-directives, using-declarations and typedefs', () => {
		const tree = parseClean([
			'using namespace std;',
			'using std::string;',
			'typedef unsigned int uint;',
			'typedef void (*Callback)(int);',
		].join('\n'));
		expect(at(tree.children, 0, 'Using')).toMatchObject({ target: 'std', isNamespace: true });
		expect(at(tree.children, 1, 'Using')).toMatchObject({ name: 'string', target: 'std::string', isNamespace: false });
		expect(at(tree.children, 2, 'Alias')).toMatchObject({ name: 'uint', form: 'typedef', target: 'unsigned int' });
		expect(at(tree.children, 3, 'Alias')).toMatchObject({ name: 'Callback', target: 'void (*)(int)' });
	});

	it('skips static_assert', () => {
		const tree = parseClean('static_assert(sizeof(int) == 4, "int");\nint after;');
		expect(tree.children.map(d => d.name)).toEqual(['after']);
	});
});
