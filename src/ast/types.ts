import type { Span } from '../core/tokens';

export type { Span };

export type TokenRole =
	| 'identifier'
	| 'keyword'
	| 'macro-name'
	| 'unknown-macro'
	| 'punctuation'
	| 'literal'
	| 'comment'
	| 'directive'
	| 'eof';

export interface Token {
	readonly kind: TokenRole;
	readonly text: string;
	readonly span: Span;
}

export interface Attribute {
	readonly name: string;
	// top-level comma-separated arguments, each rendered from its tokens
	readonly rawArguments: readonly string[];
	// every token text between the parentheses, in order
	readonly tokens: readonly string[];
	readonly hasParentheses: boolean;
	readonly span: Span;
}

export const ACCESS_SPECIFIERS = ['public', 'protected', 'private'] as const;
export type AccessSpecifier = typeof ACCESS_SPECIFIERS[number];

export type ClassKind = 'class' | 'struct' | 'union';

export const FUNCTION_QUALIFIERS = ['virtual', 'static', 'const', 'explicit', 'override', 'final', 'inline', 'constexpr', 'noexcept', 'friend', 'extern'] as const;
export type FunctionQualifier = typeof FUNCTION_QUALIFIERS[number];

export const VARIABLE_QUALIFIERS = ['static', 'const', 'constexpr', 'mutable', 'extern', 'inline', 'thread_local'] as const;
export type VariableQualifier = typeof VARIABLE_QUALIFIERS[number];

export type FunctionRole = 'function' | 'method' | 'constructor' | 'destructor' | 'operator' | 'conversion';

export interface BaseSpecifier {
	readonly name: string;
	readonly access: AccessSpecifier;
	// false when the access comes from the class-key default
	readonly explicitAccess: boolean;
	readonly isVirtual: boolean;
}

export interface Parameter {
	readonly name: string;
	readonly type: string;
	readonly defaultValue?: string;
	readonly attributes: readonly Attribute[];
}

export interface TemplateParameter {
	readonly kind: 'type' | 'value';
	readonly name: string;
	// declared type of a value parameter
	readonly type?: string;
	readonly defaultValue?: string;
	readonly isVariadic: boolean;
}

export interface Enumerator {
	readonly name: string;
	readonly value?: string;
	readonly attributes: readonly Attribute[];
}

interface DeclBase {
	readonly name: string;
	readonly attributes: readonly Attribute[];
	readonly span: Span;
	readonly comment?: string;
}

export interface NamespaceDecl extends DeclBase {
	readonly kind: 'Namespace';
	readonly isInline: boolean;
	readonly children: readonly Declaration[];
}

export interface ClassMember {
	readonly access: AccessSpecifier;
	readonly declaration: Declaration;
}

export interface ClassDecl extends DeclBase {
	readonly kind: 'Class';
	readonly classKind: ClassKind;
	readonly bases: readonly BaseSpecifier[];
	readonly members: readonly ClassMember[];
	readonly sections: Readonly<Record<AccessSpecifier, readonly Declaration[]>>;
	readonly isPolymorphic: boolean;
	readonly isDefinition: boolean;
	readonly isFinal: boolean;
	readonly exportMacros: readonly string[];
	readonly specializationArguments?: string;
}

export interface FunctionDecl extends DeclBase {
	readonly kind: 'Function';
	readonly role: FunctionRole;
	// qualifier segments of an out-of-line name: `A::B::f` -> ['A', 'B']
	readonly scope: readonly string[];
	readonly returnType?: string;
	readonly trailingReturnType?: string;
	readonly parameters: readonly Parameter[];
	readonly isVariadic: boolean;
	readonly qualifiers: readonly FunctionQualifier[];
	readonly specifier?: 'pure' | 'default' | 'delete';
	readonly memberInitializers: readonly string[];
	readonly isDefinition: boolean;
	readonly body?: Span;
}

export interface VariableDecl extends DeclBase {
	readonly kind: 'Variable';
	readonly type: string;
	readonly qualifiers: readonly VariableQualifier[];
	readonly initializer?: Span;
	readonly bitWidth?: string;
}

export interface TemplateDecl extends DeclBase {
	readonly kind: 'Template';
	readonly templateParameters: readonly TemplateParameter[];
	readonly declaration: Exclude<Declaration, TemplateDecl>;
}

export interface EnumDecl extends DeclBase {
	readonly kind: 'Enum';
	readonly isScoped: boolean;
	readonly underlyingType?: string;
	readonly enumerators: readonly Enumerator[];
	readonly isDefinition: boolean;
}

export interface AliasDecl extends DeclBase {
	readonly kind: 'Alias';
	readonly form: 'using' | 'typedef' | 'namespace';
	readonly target: string;
}

export interface UsingDecl extends DeclBase {
	readonly kind: 'Using';
	readonly target: string;
	readonly isNamespace: boolean;
}

export type Declaration =
	| NamespaceDecl
	| ClassDecl
	| FunctionDecl
	| VariableDecl
	| TemplateDecl
	| EnumDecl
	| AliasDecl
	| UsingDecl;

export type DeclarationKind = Declaration['kind'];

// The global scope: an unnamed Namespace owning the whole declaration forest.
export type SymbolTree = NamespaceDecl;

export interface Include {
	readonly path: string;
	readonly isSystem: boolean;
	readonly span: Span;
}

export function spanFrom(start: number, end: number): Span {
	return { start, end };
}

export function isAccessSpecifier(s: string): s is AccessSpecifier {
	return (ACCESS_SPECIFIERS as readonly string[]).includes(s);
}

export function isFunctionQualifier(s: string): s is FunctionQualifier {
	return (FUNCTION_QUALIFIERS as readonly string[]).includes(s);
}

export function isVariableQualifier(s: string): s is VariableQualifier {
	return (VARIABLE_QUALIFIERS as readonly string[]).includes(s);
}
