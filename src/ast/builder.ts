import type {
	AccessSpecifier, Attribute, BaseSpecifier, ClassDecl, ClassKind, ClassMember, Declaration,
	NamespaceDecl, Span, SymbolTree,
} from './types';

type ScopeKind = 'root' | 'namespace' | 'class';

interface ScopeFrame {
	kind: ScopeKind;
	access: AccessSpecifier;
	members: ClassMember[];
	attributes: Attribute[];
}

export interface ClosedScope {
	members: ClassMember[];
	attributes: Attribute[];
}

export interface ClassFields {
	name: string;
	classKind: ClassKind;
	attributes: readonly Attribute[];
	span: Span;
	comment?: string;
	bases: readonly BaseSpecifier[];
	members: readonly ClassMember[];
	isDefinition: boolean;
	isFinal: boolean;
	exportMacros: readonly string[];
	specializationArguments?: string;
}

export interface NamespaceFields {
	name: string;
	attributes: readonly Attribute[];
	span: Span;
	comment?: string;
	isInline: boolean;
	children: readonly Declaration[];
}

/**
 * Threads declarations into their lexical scopes as the parser reports scope entry
 * and exit. Makes no parsing decisions; every node it returns is frozen.
 */
export class SymbolTreeBuilder {
	private readonly stack: ScopeFrame[] = [{ kind: 'root', access: 'public', members: [], attributes: [] }];

	get depth(): number { return this.stack.length - 1; }

	private get top(): ScopeFrame {
		const frame = this.stack[this.stack.length - 1];
		if (!frame) throw new Error('SymbolTreeBuilder: scope stack is empty');
		return frame;
	}

	enterScope(kind: 'namespace' | 'class', defaultAccess: AccessSpecifier = 'public') {
		this.stack.push({ kind, access: defaultAccess, members: [], attributes: [] });
	}

	setAccess(access: AccessSpecifier) {
		this.top.access = access;
	}

	add(decl: Declaration) {
		const frame = this.top;
		frame.members.push(Object.freeze({ access: frame.access, declaration: decl }));
	}

	// attributes owned by the enclosing scope (`GENERATED_BODY()`, dangling annotations)
	attachToScope(attrs: readonly Attribute[]) {
		this.top.attributes.push(...attrs);
	}

	exitScope(): ClosedScope {
		if (this.stack.length <= 1) throw new Error('SymbolTreeBuilder: cannot exit the global scope');
		const frame = this.top;
		this.stack.pop();
		return { members: frame.members, attributes: frame.attributes };
	}

	finish(span: Span): SymbolTree {
		if (this.stack.length !== 1) throw new Error(`SymbolTreeBuilder: ${this.depth} scope(s) left open`);
		const root = this.top;
		return makeNamespace({
			name: '',
			attributes: root.attributes,
			span,
			isInline: false,
			children: root.members.map(m => m.declaration),
		});
	}
}

export function makeNamespace(f: NamespaceFields): NamespaceDecl {
	const node: NamespaceDecl = {
		kind: 'Namespace',
		name: f.name,
		attributes: Object.freeze([...f.attributes]),
		span: Object.freeze({ ...f.span }),
		...(f.comment ? { comment: f.comment } : {}),
		isInline: f.isInline,
		children: Object.freeze([...f.children]),
	};
	return Object.freeze(node);
}

export function makeClass(f: ClassFields): ClassDecl {
	const sections: Record<AccessSpecifier, Declaration[]> = { public: [], protected: [], private: [] };
	for (const m of f.members) sections[m.access].push(m.declaration);
	const isPolymorphic = f.members.some(m => m.declaration.kind === 'Function' && m.declaration.qualifiers.includes('virtual'));
	const node: ClassDecl = {
		kind: 'Class',
		name: f.name,
		classKind: f.classKind,
		attributes: Object.freeze([...f.attributes]),
		span: Object.freeze({ ...f.span }),
		...(f.comment ? { comment: f.comment } : {}),
		bases: Object.freeze(f.bases.map(b => Object.freeze({ ...b }))),
		members: Object.freeze([...f.members]),
		sections: Object.freeze({
			public: Object.freeze(sections.public),
			protected: Object.freeze(sections.protected),
			private: Object.freeze(sections.private),
		}),
		isPolymorphic,
		isDefinition: f.isDefinition,
		isFinal: f.isFinal,
		exportMacros: Object.freeze([...f.exportMacros]),
		...(f.specializationArguments !== undefined ? { specializationArguments: f.specializationArguments } : {}),
	};
	return Object.freeze(node);
}

/** Freeze a leaf declaration (and its arrays) before it is inserted. */
export function freezeDeclaration<T extends Declaration>(decl: T): T {
	for (const value of Object.values(decl)) {
		if (Array.isArray(value)) {
			for (const item of value) if (item && typeof item === 'object') Object.freeze(item);
			Object.freeze(value);
		} else if (value && typeof value === 'object') {
			Object.freeze(value);
		}
	}
	return Object.freeze(decl);
}
