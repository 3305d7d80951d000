import { AssertNever } from '../utils';
import type { Declaration } from './types';

export interface WalkContext {
	// enclosing named scopes, outermost first
	path: readonly string[];
	parent: Declaration | null;
	depth: number;
}

/** Visitor result: `false` skips the children of the current node. */
export type Visitor = (decl: Declaration, ctx: WalkContext) => boolean | void;

export function childrenOf(decl: Declaration): readonly Declaration[] {
	switch (decl.kind) {
		case 'Namespace': return decl.children;
		case 'Class': return decl.members.map(m => m.declaration);
		case 'Template': return [decl.declaration];
		case 'Function':
		case 'Variable':
		case 'Enum':
		case 'Alias':
		case 'Using':
			return [];
		default:
			return AssertNever(decl);
	}
}

// Names a declaration contributes to the qualified path of its children.
function scopeSegment(decl: Declaration): string | null {
	switch (decl.kind) {
		case 'Namespace': return decl.name || null;
		case 'Class': return decl.name ? decl.name + (decl.specializationArguments ?? '') : null;
		// a Template shares its name with the wrapped declaration
		default: return null;
	}
}

/** Pre-order walk in source order. The root itself is visited too. */
export function walkDeclarations(root: Declaration, visit: Visitor): void {
	const rec = (decl: Declaration, ctx: WalkContext) => {
		if (visit(decl, ctx) === false) return;
		const seg = scopeSegment(decl);
		const path = seg ? [...ctx.path, seg] : ctx.path;
		for (const child of childrenOf(decl)) rec(child, { path, parent: decl, depth: ctx.depth + 1 });
	};
	rec(root, { path: [], parent: null, depth: 0 });
}

export interface FlatSymbol {
	// `MyNamespace::SimpleClass::getValue`
	qualifiedName: string;
	declaration: Declaration;
	// the Template node when the declaration is a template's body
	template?: Declaration;
}

function qualify(path: readonly string[], decl: Declaration): string {
	const own = decl.kind === 'Function' ? [...decl.scope, decl.name] : [decl.name];
	return [...path, ...own].join('::');
}

/**
 * Every named declaration with its fully qualified name. Templates are reported once,
 * through the declaration they wrap; enumerators of unscoped enums are not listed.
 */
export function flattenSymbols(root: Declaration): FlatSymbol[] {
	const out: FlatSymbol[] = [];
	walkDeclarations(root, (decl, ctx) => {
		if (decl.kind === 'Template' || !decl.name) return;
		const template = ctx.parent?.kind === 'Template' ? ctx.parent : undefined;
		out.push({ qualifiedName: qualify(ctx.path, decl), declaration: decl, ...(template ? { template } : {}) });
	});
	return out;
}

/**
 * Look up declarations by qualified name (`A::B::f`) or by a trailing part of it (`B::f`, `f`).
 * Overloads all match.
 */
export function findDeclaration(root: Declaration, name: string): Declaration[] {
	const wanted = name.replace(/\s+/g, '');
	return flattenSymbols(root)
		.filter(s => {
			const q = s.qualifiedName.replace(/\s+/g, '');
			return q === wanted || q.endsWith('::' + wanted);
		})
		.map(s => s.declaration);
}
