import { DocumentSymbol, Range, SymbolKind } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Span } from './core/tokens';
import type { ClassDecl, Declaration, FunctionDecl, SymbolTree } from './ast/types';
import { AssertNever } from './utils';

export function spanToRange(doc: TextDocument, span: Span): Range {
	return Range.create(doc.positionAt(span.start), doc.positionAt(span.end));
}

function classSymbolKind(c: ClassDecl): SymbolKind {
	return c.classKind === 'class' ? SymbolKind.Class : SymbolKind.Struct;
}

function functionSymbolKind(fn: FunctionDecl): SymbolKind {
	switch (fn.role) {
		case 'constructor': return SymbolKind.Constructor;
		case 'operator':
		case 'conversion': return SymbolKind.Operator;
		case 'method':
		case 'destructor': return SymbolKind.Method;
		case 'function': return fn.scope.length > 0 ? SymbolKind.Method : SymbolKind.Function;
		default: return AssertNever(fn.role);
	}
}

function functionLabel(fn: FunctionDecl): string {
	const params = fn.parameters.map(p => p.type).join(', ');
	return `${[...fn.scope, fn.name].join('::')}(${params}${fn.isVariadic ? (params ? ', ...' : '...') : ''})`;
}

// Name shown for nodes that have none in source
function displayName(decl: Declaration): string {
	if (decl.name) return decl.name;
	switch (decl.kind) {
		case 'Namespace': return '(anonymous namespace)';
		case 'Class': return `(anonymous ${decl.classKind})`;
		case 'Enum': return '(anonymous enum)';
		default: return `(anonymous ${decl.kind.toLowerCase()})`;
	}
}

function toSymbol(doc: TextDocument, decl: Declaration): DocumentSymbol | null {
	const range = spanToRange(doc, decl.span);
	const attrs = decl.attributes.map(a => a.name).join(' ');
	const withAttrs = (detail: string | undefined) => (attrs ? [attrs, detail].filter(Boolean).join(' ') : detail) || undefined;
	switch (decl.kind) {
		case 'Namespace':
			return DocumentSymbol.create(displayName(decl), undefined, SymbolKind.Namespace, range, range, childSymbols(doc, decl.children));
		case 'Class':
			return DocumentSymbol.create(displayName(decl), withAttrs(decl.bases.map(b => b.name).join(', ') || undefined), classSymbolKind(decl), range, range, childSymbols(doc, decl.members.map(m => m.declaration)));
		case 'Function':
			return DocumentSymbol.create(functionLabel(decl), withAttrs(decl.returnType ?? decl.trailingReturnType), functionSymbolKind(decl), range, range);
		case 'Variable': {
			const kind = decl.qualifiers.includes('constexpr') ? SymbolKind.Constant : SymbolKind.Field;
			return DocumentSymbol.create(displayName(decl), withAttrs(decl.type), kind, range, range);
		}
		case 'Template': {
			const inner = toSymbol(doc, decl.declaration);
			if (!inner) return null;
			const params = decl.templateParameters.map(p => p.kind === 'type' ? `typename ${p.name}` : `${p.type ?? ''} ${p.name}`.trim()).join(', ');
			return { ...inner, detail: [`template<${params}>`, inner.detail].filter(Boolean).join(' '), range };
		}
		case 'Enum': {
			const members = decl.enumerators.map(e => DocumentSymbol.create(e.name, e.value, SymbolKind.EnumMember, range, range));
			return DocumentSymbol.create(displayName(decl), withAttrs(decl.underlyingType), SymbolKind.Enum, range, range, members);
		}
		case 'Alias':
			return DocumentSymbol.create(decl.name, decl.target, SymbolKind.TypeParameter, range, range);
		case 'Using':
			// imports nothing the outline should show
			return null;
		default:
			return AssertNever(decl);
	}
}

function childSymbols(doc: TextDocument, decls: readonly Declaration[]): DocumentSymbol[] {
	const out: DocumentSymbol[] = [];
	for (const d of decls) {
		const sym = toSymbol(doc, d);
		if (sym) out.push(sym);
	}
	return out;
}

/** Outline of a parsed document: the root's children, nested by scope. */
export function documentSymbols(doc: TextDocument, tree: SymbolTree): DocumentSymbol[] {
	return childSymbols(doc, tree.children);
}
