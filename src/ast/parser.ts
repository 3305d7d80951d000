/*
	Declaration parser for C++ headers and sources. Consumes a classified token stream,
	collects reflection-macro attributes in front of declarations, and builds a frozen
	symbol tree. Function bodies and initializers are skipped as opaque spans.
*/
import type { CancellationToken } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { Diagnostic } from '../analysisTypes';
import { tokenize } from '../core/tokenizer';
import type { RawToken } from '../core/tokens';
import { debugLog } from '../log';
import { AttributeRecognizer, isMacroToken } from './attributes';
import { SymbolTreeBuilder, freezeDeclaration, makeClass, makeNamespace } from './builder';
import { classifyTokens, isTypeKeyword } from './classifier';
import { TokenCursor } from './cursor';
import { type MacroSpec, type MacroTable, DEFAULT_MACRO_TABLE, createMacroTable, isExportMacro, isMacroShaped } from './macros';
import { ParseError, Recovery } from './recovery';
import { isPunct, renderTokens, splitTopLevel } from './text';
import {
	type AccessSpecifier, type AliasDecl, type Attribute, type BaseSpecifier, type ClassKind,
	type Declaration, type EnumDecl, type Enumerator, type FunctionDecl, type FunctionQualifier,
	type FunctionRole, type Include, type Parameter, type Span, type SymbolTree, type TemplateDecl,
	type TemplateParameter, type Token, type UsingDecl, type VariableDecl, type VariableQualifier,
	isAccessSpecifier, isFunctionQualifier, isVariableQualifier, spanFrom,
} from './types';

export interface ParseOptions {
	// replaces the default reflection-macro table
	macroTable?: MacroTable;
	// extra macro names added on top of `macroTable` (or the default table)
	extraMacros?: Iterable<string | MacroSpec>;
	cancellation?: CancellationToken;
	// stop at the next scope-loop check once this many significant tokens are consumed
	tokenLimit?: number;
	file?: string;
}

export interface ParseResult {
	tree: SymbolTree;
	diagnostics: readonly Diagnostic[];
	includes: readonly Include[];
	cancelled: boolean;
}

export function parseTokens(raw: readonly RawToken[], opts?: ParseOptions): ParseResult {
	const base = opts?.macroTable ?? DEFAULT_MACRO_TABLE;
	const table = opts?.extraMacros ? createMacroTable(opts.extraMacros, base) : base;
	const tokens = classifyTokens(raw, table);
	const P = new Parser(tokens, table, opts);
	const result = P.parse();
	return { ...result, includes: collectIncludes(raw) };
}

export function parseSource(text: string, opts?: ParseOptions): ParseResult {
	return parseTokens(tokenize(text, opts?.file), opts);
}

export function parseDocument(doc: TextDocument, opts?: ParseOptions): ParseResult {
	const file = opts?.file ?? (doc.uri.startsWith('file://') ? URI.parse(doc.uri).fsPath : doc.uri);
	return parseSource(doc.getText(), { ...opts, file });
}

const INCLUDE_RE = /^#\s*(?:include|import)\s*([<"])([^>"]+)[>"]/;

export function collectIncludes(raw: readonly RawToken[]): readonly Include[] {
	const out: Include[] = [];
	for (const t of raw) {
		if (t.kind !== 'directive') continue;
		const m = INCLUDE_RE.exec(t.value);
		if (!m || !m[2]) continue;
		out.push(Object.freeze({ path: m[2], isSystem: m[1] === '<', span: Object.freeze({ ...t.span }) }));
	}
	return Object.freeze(out);
}

type ScopeContext =
	| { kind: 'root' }
	| { kind: 'namespace'; name: string }
	| { kind: 'class'; name: string; classKind: ClassKind }
	// `extern "C" { ... }`: transparent, members land in the enclosing scope
	| { kind: 'linkage'; parent: ScopeContext };

interface QualifiedName {
	tokens: Token[];
	segments: string[];
	last: string;
	isDestructor: boolean;
	isOperator: boolean;
	isConversion: boolean;
}

interface DeclHead {
	start: number;
	leading: string[];
	typeTokens: Token[];
	// annotation macros found between the specifiers and the declarator
	macros: Attribute[];
	name?: QualifiedName;
}

const LEADING_SPECIFIERS = new Set([
	'virtual', 'static', 'explicit', 'inline', 'constexpr', 'consteval', 'constinit', 'friend',
	'extern', 'mutable', 'thread_local', 'register',
]);
const CV = new Set(['const', 'volatile']);
const ELABORATED = new Set(['typename', 'struct', 'class', 'union', 'enum']);
const DECLARATOR_OPS = new Set(['*', '&', '&&', '...']);
const HEAD_STOPS = new Set(['(', ';', '=', '{', '[', ',', ':', ')', '}']);

/**
 * When `collectUntil` reads `<` after a name as a template argument list:
 * never, only before a top-level `=`, or always (parameter lists, default arguments included).
 */
type AngleRule = 'never' | 'head' | 'always';

function enclosingClass(ctx: ScopeContext): { name: string; classKind: ClassKind } | undefined {
	if (ctx.kind === 'class') return ctx;
	if (ctx.kind === 'linkage') return enclosingClass(ctx.parent);
	return undefined;
}

/** Name a constructor takes in this scope, when inside a class. */
function constructorName(ctx: ScopeContext): string | undefined {
	const cls = enclosingClass(ctx);
	return cls?.name ? stripTemplateArgs(cls.name) : undefined;
}

function stripTemplateArgs(name: string): string {
	const i = name.indexOf('<');
	return i < 0 ? name : name.slice(0, i);
}

function describeScope(ctx: ScopeContext): string {
	switch (ctx.kind) {
		case 'root': return 'file';
		case 'namespace': return ctx.name ? `namespace '${ctx.name}'` : 'anonymous namespace';
		case 'class': return `${ctx.classKind} '${ctx.name}'`;
		case 'linkage': return 'linkage block';
	}
}

class Parser {
	private readonly cur: TokenCursor;
	private readonly recovery = new Recovery();
	private readonly builder = new SymbolTreeBuilder();
	private readonly attrs: AttributeRecognizer;
	private readonly cancellation?: CancellationToken;
	private readonly tokenLimit: number;
	private cancelled = false;

	constructor(tokens: readonly Token[], table: MacroTable, opts?: ParseOptions) {
		this.cur = new TokenCursor(tokens);
		this.attrs = new AttributeRecognizer(this.cur, this.recovery, table);
		this.cancellation = opts?.cancellation;
		this.tokenLimit = opts?.tokenLimit ?? Number.POSITIVE_INFINITY;
	}

	parse(): Omit<ParseResult, 'includes'> {
		const start = this.cur.peek().span.start;
		this.parseScopeBody({ kind: 'root' });
		const end = Math.max(this.cur.end, this.cur.peek().span.end, start + 1);
		const tree = this.builder.finish(spanFrom(start, end));
		debugLog('parse', `${tree.children.length} top-level declaration(s), ${this.recovery.diagnostics.length} diagnostic(s)`);
		return { tree, diagnostics: Object.freeze([...this.recovery.diagnostics]), cancelled: this.cancelled };
	}

	// ---- scope loop ---------------------------------------------------------

	private checkCancelled(): boolean {
		if (this.cancelled) return true;
		const limitHit = this.cur.consumed >= this.tokenLimit;
		if (!limitHit && !this.cancellation?.isCancellationRequested) return false;
		this.cancelled = true;
		const at = this.cur.peek();
		this.recovery.report('ParseCancelled', at, limitHit ? `token limit of ${this.tokenLimit} reached; returning partial tree` : 'parse cancelled; returning partial tree');
		this.recovery.halt();
		return true;
	}

	/** Parse declarations until the `}` closing this scope (left unconsumed) or end of input. */
	private parseScopeBody(ctx: ScopeContext) {
		for (; ;) {
			if (this.recovery.halted || this.checkCancelled()) return;
			const t = this.cur.peek();
			if (t.kind === 'eof') {
				if (ctx.kind !== 'root') this.recovery.report('UnbalancedDelimiter', t, `missing '}' to close ${describeScope(ctx)}`, true);
				return;
			}
			if (isPunct(t, '}')) {
				if (ctx.kind !== 'root') return;
				this.recovery.report('UnbalancedDelimiter', t, "unmatched '}'");
				this.cur.next();
				continue;
			}
			if (isPunct(t, ';')) { this.cur.next(); continue; }
			if (ctx.kind === 'class' && this.tryAccessLabel()) continue;

			const comment = this.cur.leadingComment();
			try {
				const collected = this.attrs.collect(constructorName(ctx));
				this.builder.attachToScope(collected.body);
				if (this.atDeclarationEnd(ctx)) {
					// annotations with nothing to annotate belong to the scope
					this.builder.attachToScope(collected.declaration);
					continue;
				}
				for (const d of this.parseDeclaration(ctx, collected.declaration, comment)) this.builder.add(d);
			} catch (e) {
				if (!(e instanceof ParseError)) throw e;
				this.recovery.fail(e);
				if (e.fatal) return;
				this.recovery.synchronize(this.cur);
			}
		}
	}

	private atDeclarationEnd(ctx: ScopeContext): boolean {
		const t = this.cur.peek();
		if (t.kind === 'eof' || isPunct(t, '}') || isPunct(t, ';')) return true;
		return enclosingClass(ctx) !== undefined && this.isAccessLabelAt(0);
	}

	private isAccessLabelAt(k: number): boolean {
		const t = this.cur.peek(k);
		if (t.kind === 'keyword' && isAccessSpecifier(t.text)) {
			if (this.cur.at(':', k + 1)) return true;
			// Qt: `public slots:` / `public Q_SLOTS:`
			const q = this.cur.peek(k + 1);
			return q.kind === 'identifier' && (q.text === 'slots' || q.text === 'Q_SLOTS') && this.cur.at(':', k + 2);
		}
		// Qt: `signals:` / `Q_SIGNALS:`
		return t.kind === 'identifier' && (t.text === 'signals' || t.text === 'Q_SIGNALS') && this.cur.at(':', k + 1);
	}

	private tryAccessLabel(): boolean {
		if (!this.isAccessLabelAt(0)) return false;
		const t = this.cur.next();
		const access: AccessSpecifier = isAccessSpecifier(t.text) ? t.text : 'public';
		if (!this.cur.at(':')) this.cur.next(); // slots
		this.cur.next(); // ':'
		this.builder.setAccess(access);
		return true;
	}

	// ---- dispatch -------------------------------------------------------------

	private parseDeclaration(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration[] {
		const t = this.cur.peek();
		if (t.kind === 'keyword') {
			switch (t.text) {
				case 'namespace':
					return [this.parseNamespace(attrs, comment, false)];
				case 'inline':
					if (this.cur.at('namespace', 1)) { this.cur.next(); return [this.parseNamespace(attrs, comment, true)]; }
					break;
				case 'class':
				case 'struct':
				case 'union':
					return this.parseClass(ctx, attrs, comment);
				case 'template': {
					const node = this.parseTemplate(ctx, attrs, comment);
					return node ? [node] : [];
				}
				case 'enum':
					return this.parseEnum(ctx, attrs, comment);
				case 'using':
					return [this.parseUsing(attrs, comment)];
				case 'typedef':
					return this.parseTypedef(ctx, attrs, comment);
				case 'static_assert':
					this.skipStaticAssert();
					return [];
				case 'extern': {
					const lang = this.cur.peek(1);
					if (lang.kind === 'literal' && this.cur.at('{', 2)) { this.parseLinkageBlock(ctx); return []; }
					break;
				}
				case 'friend': {
					// `friend class X;` declares nothing in this scope
					const k = this.cur.peek(1);
					if (k.kind === 'keyword' && (k.text === 'class' || k.text === 'struct' || k.text === 'union') && this.friendClassEnds()) return [];
					break;
				}
				case 'public':
				case 'protected':
				case 'private':
					throw new ParseError('UnknownConstruct', t, `access specifier '${t.text}' outside of a class body`);
			}
		}
		return this.parseFunctionOrVariable(ctx, attrs, comment);
	}

	private friendClassEnds(): boolean {
		for (let k = 2; k < 64; k++) {
			const t = this.cur.peek(k);
			if (t.kind === 'eof' || isPunct(t, '{') || isPunct(t, '(')) return false;
			if (isPunct(t, ';')) {
				this.cur.reset(this.cur.mark() + k + 1);
				return true;
			}
		}
		return false;
	}

	private skipStaticAssert() {
		const kw = this.cur.next();
		if (!this.cur.at('(')) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected '(' after static_assert");
		const group = this.cur.skipBalanced('(', ')');
		if (!group.closed) throw new ParseError('UnbalancedDelimiter', spanFrom(kw.span.start, group.span.end), "missing ')' to close static_assert", true);
		this.expectSemicolon();
	}

	private parseLinkageBlock(ctx: ScopeContext) {
		this.cur.next(); // extern
		this.cur.next(); // "C"
		this.cur.next(); // {
		this.parseScopeBody({ kind: 'linkage', parent: ctx });
		this.cur.maybe('}');
	}

	// ---- namespace --------------------------------------------------------------

	private parseNamespace(attrs: Attribute[], comment: string | undefined, isInline: boolean): Declaration {
		const kw = this.cur.next();
		const names: string[] = [];
		const inlineFlags: boolean[] = [];
		let nextInline = isInline;
		while (this.cur.peek().kind === 'identifier') {
			names.push(this.cur.next().text);
			inlineFlags.push(nextInline);
			nextInline = false;
			if (!this.cur.at('::')) break;
			this.cur.next();
			if (this.cur.at('inline')) { this.cur.next(); nextInline = true; }
		}
		// `[[deprecated]]` style attributes after the name
		this.skipStandardAttributes();
		if (this.cur.at('=')) {
			this.cur.next();
			const target = this.collectUntil(new Set([';']), 'head');
			this.expectSemicolon();
			const alias: AliasDecl = { kind: 'Alias', name: names.join('::'), attributes: attrs, span: this.cur.spanFrom(kw.span.start), ...(comment ? { comment } : {}), form: 'namespace', target: renderTokens(target) };
			return freezeDeclaration(alias);
		}
		const open = this.cur.peek();
		if (!isPunct(open, '{')) throw new ParseError('LexicalMismatch', open, "expected '{' after namespace name");
		this.cur.next();
		if (names.length === 0) { names.push(''); inlineFlags.push(isInline); }
		for (let i = 0; i < names.length; i++) this.builder.enterScope('namespace');
		this.parseScopeBody({ kind: 'namespace', name: names.join('::') });
		this.cur.maybe('}');
		const span = this.cur.spanFrom(kw.span.start);
		// close innermost first; each namespace becomes a child of the one around it
		let node: Declaration | undefined;
		for (let i = names.length - 1; i >= 0; i--) {
			if (node) this.builder.add(node);
			const closed = this.builder.exitScope();
			const outermost = i === 0;
			node = makeNamespace({
				name: names[i] ?? '',
				attributes: outermost ? [...attrs, ...closed.attributes] : closed.attributes,
				span,
				...(outermost && comment ? { comment } : {}),
				isInline: inlineFlags[i] ?? false,
				children: closed.members.map(m => m.declaration),
			});
		}
		if (!node) throw new ParseError('LexicalMismatch', kw, 'expected namespace body');
		return node;
	}

	// ---- class / struct / union -----------------------------------------------

	private parseClass(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration[] {
		const startMark = this.cur.mark();
		const kw = this.cur.next();
		const classKind: ClassKind = kw.text === 'struct' ? 'struct' : kw.text === 'union' ? 'union' : 'class';
		const words: string[] = [];
		const headAttrs: Attribute[] = [];
		for (; ;) {
			this.skipStandardAttributes();
			const t = this.cur.peek();
			if (t.kind === 'identifier' && t.text === 'final' && (this.cur.at('{', 1) || this.cur.at(':', 1))) break;
			if (isMacroToken(t)) {
				// `class DLL_EXPORT(x) Foo`
				const a = this.attrs.captureOne();
				if (a) headAttrs.push(a);
				continue;
			}
			if (t.kind === 'keyword' && t.text === 'alignas') { this.cur.next(); this.skipParenGroup(); continue; }
			if (t.kind !== 'identifier') break;
			// only export macros may precede the class name: `struct stat info;` names a variable
			const prev = words[words.length - 1];
			if (prev !== undefined && !isMacroShaped(prev)) break;
			let word = this.cur.next().text;
			while (this.cur.at('::') && this.cur.peek(1).kind === 'identifier') { this.cur.next(); word += '::' + this.cur.next().text; }
			words.push(word);
		}
		const name = words.length > 0 ? words[words.length - 1] ?? '' : '';
		const exportMacros = words.slice(0, -1);
		const declAttrs = [...attrs, ...headAttrs];
		let specializationArguments: string | undefined;
		if (this.cur.at('<') && name) specializationArguments = renderTokens(this.captureAngle());
		let isFinal = false;
		if (this.cur.peek().kind === 'identifier' && this.cur.peek().text === 'final') { this.cur.next(); isFinal = true; }

		if (this.cur.at(';') && name) {
			this.cur.next();
			return [makeClass({ name, classKind, attributes: declAttrs, span: this.cur.spanFrom(kw.span.start), ...(comment ? { comment } : {}), bases: [], members: [], isDefinition: false, isFinal, exportMacros, ...(specializationArguments !== undefined ? { specializationArguments } : {}) })];
		}
		if (!this.cur.at(':') && !this.cur.at('{')) {
			// elaborated type specifier: `struct stat info;`, `class Foo* make();`
			if (!name || exportMacros.length > 0) throw new ParseError('LexicalMismatch', this.cur.peek(), `expected '{' in ${classKind} declaration`);
			this.cur.reset(startMark);
			return this.parseFunctionOrVariable(ctx, attrs, comment);
		}
		const bases = this.cur.at(':') ? this.parseBaseList(classKind) : [];
		if (!this.cur.at('{')) throw new ParseError('LexicalMismatch', this.cur.peek(), `expected '{' in ${classKind} declaration`);
		this.cur.next();
		const defaultAccess: AccessSpecifier = classKind === 'class' ? 'private' : 'public';
		this.builder.enterScope('class', defaultAccess);
		this.parseScopeBody({ kind: 'class', name, classKind });
		this.cur.maybe('}');
		const closed = this.builder.exitScope();
		const cls = makeClass({
			name,
			classKind,
			attributes: [...declAttrs, ...closed.attributes],
			span: this.cur.spanFrom(kw.span.start),
			...(comment ? { comment } : {}),
			bases,
			members: closed.members,
			isDefinition: true,
			isFinal,
			exportMacros,
			...(specializationArguments !== undefined ? { specializationArguments } : {}),
		});
		if (this.recovery.halted) return [cls];
		const out: Declaration[] = [cls];
		if (!this.cur.at(';')) {
			// trailing declarators: `struct { int x; } point, *ptr;`
			const typeName = name || classKind;
			if (this.cur.peek().kind === 'identifier' || this.cur.at('*') || this.cur.at('&')) {
				out.push(...this.parseDeclaratorList(cls.span.start, typeName, [], [], undefined));
				return out;
			}
		}
		this.expectSemicolon();
		return out;
	}

	private parseBaseList(classKind: ClassKind): BaseSpecifier[] {
		this.cur.next(); // ':'
		const defaultAccess: AccessSpecifier = classKind === 'class' ? 'private' : 'public';
		const bases: BaseSpecifier[] = [];
		for (; ;) {
			let access: AccessSpecifier | undefined;
			let isVirtual = false;
			for (; ;) {
				const t = this.cur.peek();
				if (t.kind !== 'keyword') break;
				if (isAccessSpecifier(t.text)) { access = t.text; this.cur.next(); continue; }
				if (t.text === 'virtual') { isVirtual = true; this.cur.next(); continue; }
				break;
			}
			const t = this.cur.peek();
			if (t.kind !== 'identifier' && !isPunct(t, '::')) throw new ParseError('LexicalMismatch', t, 'expected base class name');
			const name = this.readQualifiedName();
			let text = renderTokens(name.tokens);
			if (this.cur.at('...')) text += this.cur.next().text;
			bases.push({ name: text, access: access ?? defaultAccess, explicitAccess: access !== undefined, isVirtual });
			if (!this.cur.maybe(',')) break;
		}
		return bases;
	}

	// ---- template -------------------------------------------------------------

	/** Returns null for a templated `friend class X;`, which declares nothing here. */
	private parseTemplate(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration | null {
		const kw = this.cur.peek();
		const params: TemplateParameter[] = [];
		// consecutive headers collapse into one node: template<class T> template<class U> ...
		while (this.cur.at('template')) {
			this.cur.next();
			if (this.cur.at('<')) params.push(...this.parseTemplateParameters());
		}
		const inner = this.attrs.collect(constructorName(ctx));
		const innerAttrs = [...inner.declaration, ...inner.body];
		const start = this.cur.peek();
		if (start.kind === 'eof' || isPunct(start, '}') || isPunct(start, ';')) throw new ParseError('LexicalMismatch', start, 'expected a declaration after template parameter list');
		const decls = this.parseDeclaration(ctx, innerAttrs, undefined);
		if (decls.length === 0 && start.kind === 'keyword' && start.text === 'friend') return null;
		const wrapped = decls[0];
		if (!wrapped || decls.length !== 1) throw new ParseError('LexicalMismatch', spanFrom(kw.span.start, Math.max(this.cur.end, kw.span.end)), 'expected exactly one declaration after template parameter list');
		if (wrapped.kind === 'Template' || wrapped.kind === 'Namespace' || wrapped.kind === 'Using') {
			throw new ParseError('LexicalMismatch', wrapped.span, `a ${wrapped.kind.toLowerCase()} cannot be templated`);
		}
		const node: TemplateDecl = {
			kind: 'Template',
			name: wrapped.name,
			attributes: attrs,
			span: this.cur.spanFrom(kw.span.start),
			...(comment ? { comment } : {}),
			templateParameters: params,
			declaration: wrapped,
		};
		return freezeDeclaration(node);
	}

	private parseTemplateParameters(): TemplateParameter[] {
		const list = this.captureAngle();
		const inner = list.slice(1, -1);
		if (inner.length === 0) return [];
		return splitTopLevelAngles(inner).map(group => this.toTemplateParameter(group));
	}

	private toTemplateParameter(tokens: Token[]): TemplateParameter {
		let toks = tokens;
		// template-template parameter: template<typename> class TT
		if (toks[0]?.text === 'template' && isPunct(toks[1], '<')) {
			let depth = 0;
			let k = 1;
			for (; k < toks.length; k++) {
				const t = toks[k];
				if (isPunct(t, '<')) depth++;
				else if (isPunct(t, '>')) { depth--; if (depth === 0) break; }
			}
			toks = toks.slice(k + 1);
		}
		const eq = toks.findIndex(t => isPunct(t, '='));
		const head = eq < 0 ? toks : toks.slice(0, eq);
		const defaultValue = eq < 0 ? undefined : renderTokens(toks.slice(eq + 1));
		const isVariadic = head.some(t => isPunct(t, '...'));
		const first = head[0];
		if (first && first.kind === 'keyword' && (first.text === 'typename' || first.text === 'class')) {
			// `typename [...] [Name]`; anything longer (`typename T::type V`) is a value parameter
			const rest = isPunct(head[1], '...') ? head.slice(2) : head.slice(1);
			const nameTok = rest[0];
			if (rest.length === 0 || (rest.length === 1 && nameTok?.kind === 'identifier')) {
				return { kind: 'type', name: nameTok?.text ?? '', isVariadic, ...(defaultValue !== undefined ? { defaultValue } : {}) };
			}
		}
		const last = head[head.length - 1];
		const hasName = head.length > 1 && last !== undefined && last.kind === 'identifier';
		const typeToks = hasName ? head.slice(0, -1) : head;
		return {
			kind: 'value',
			name: hasName && last ? last.text : '',
			type: renderTokens(typeToks),
			isVariadic,
			...(defaultValue !== undefined ? { defaultValue } : {}),
		};
	}

	// ---- enum -----------------------------------------------------------------

	private parseEnum(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration[] {
		const startMark = this.cur.mark();
		const kw = this.cur.next();
		let isScoped = false;
		if (this.cur.at('class') || this.cur.at('struct')) { this.cur.next(); isScoped = true; }
		this.skipStandardAttributes();
		let name = '';
		if (this.cur.peek().kind === 'identifier') {
			name = this.cur.next().text;
			while (this.cur.at('::') && this.cur.peek(1).kind === 'identifier') { this.cur.next(); name += '::' + this.cur.next().text; }
		}
		let underlyingType: string | undefined;
		if (this.cur.at(':')) {
			this.cur.next();
			const toks = this.collectUntil(new Set(['{', ';']), 'head');
			if (toks.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), 'expected underlying type after ":"');
			underlyingType = renderTokens(toks);
		}
		const base = {
			kind: 'Enum' as const,
			name,
			attributes: attrs,
			...(comment ? { comment } : {}),
			isScoped,
			...(underlyingType !== undefined ? { underlyingType } : {}),
		};
		if (this.cur.at(';')) {
			this.cur.next();
			const fwd: EnumDecl = { ...base, span: this.cur.spanFrom(kw.span.start), enumerators: [], isDefinition: false };
			return [freezeDeclaration(fwd)];
		}
		if (!this.cur.at('{')) {
			if (!name || isScoped) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected '{' in enum declaration");
			// elaborated: `enum Color c;`
			this.cur.reset(startMark);
			return this.parseFunctionOrVariable(ctx, attrs, comment);
		}
		this.cur.next();
		const enumerators: Enumerator[] = [];
		for (; ;) {
			if (this.recovery.halted || this.checkCancelled()) break;
			if (this.cur.at('}')) break;
			const before = this.attrs.collect();
			const t = this.cur.peek();
			if (t.kind === 'eof') throw new ParseError('UnbalancedDelimiter', t, `missing '}' to close enum '${name}'`, true);
			if (t.kind !== 'identifier') throw new ParseError('LexicalMismatch', t, 'expected enumerator name');
			this.cur.next();
			const after = this.attrs.collectTrailing();
			let value: string | undefined;
			let afterValue: Attribute[] = [];
			if (this.cur.maybe('=')) {
				const toks = this.collectUntil(new Set([',', '}']), 'never');
				// trailing UMETA(...) after the value is not part of it
				const macroAt = toks.findIndex(isMacroToken);
				const valueToks = macroAt < 0 ? toks : toks.slice(0, macroAt);
				if (valueToks.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), `expected value for enumerator '${t.text}'`);
				value = renderTokens(valueToks);
				if (macroAt >= 0) afterValue = this.reparseTrailing(toks.slice(macroAt));
			}
			const attributes = Object.freeze([...before.declaration, ...before.body, ...after, ...afterValue]);
			enumerators.push(Object.freeze({ name: t.text, ...(value !== undefined ? { value } : {}), attributes }));
			if (this.cur.maybe(',')) continue;
			if (this.cur.at('}')) break;
			const bad = this.cur.peek();
			if (bad.kind === 'eof') throw new ParseError('UnbalancedDelimiter', bad, `missing '}' to close enum '${name}'`, true);
			throw new ParseError('LexicalMismatch', bad, "expected ',' or '}' after enumerator");
		}
		this.cur.maybe('}');
		const node: EnumDecl = { ...base, span: this.cur.spanFrom(kw.span.start), enumerators, isDefinition: true };
		const out: Declaration[] = [freezeDeclaration(node)];
		if (this.recovery.halted) return out;
		if (!this.cur.at(';') && (this.cur.peek().kind === 'identifier' || this.cur.at('*'))) {
			out.push(...this.parseDeclaratorList(node.span.start, name || 'enum', [], [], undefined));
			return out;
		}
		this.expectSemicolon();
		return out;
	}

	// Attribute captures for macro tokens already pulled out of a value run
	private reparseTrailing(toks: Token[]): Attribute[] {
		const out: Attribute[] = [];
		let i = 0;
		while (i < toks.length) {
			const nameTok = toks[i];
			if (!nameTok || !isMacroToken(nameTok)) { i++; continue; }
			let j = i + 1;
			const inner: Token[] = [];
			let end = nameTok.span.end;
			const hasParentheses = isPunct(toks[j], '(');
			if (hasParentheses) {
				let depth = 0;
				for (; j < toks.length; j++) {
					const t = toks[j];
					if (!t) break;
					end = t.span.end;
					if (isPunct(t, '(')) { depth++; if (depth === 1) continue; }
					else if (isPunct(t, ')')) { depth--; if (depth === 0) { j++; break; } }
					inner.push(t);
				}
			}
			out.push(Object.freeze({
				name: nameTok.text,
				rawArguments: Object.freeze(inner.length === 0 ? [] : splitTopLevel(inner, ',').map(renderTokens)),
				tokens: Object.freeze(inner.map(t => t.text)),
				hasParentheses,
				span: Object.freeze({ start: nameTok.span.start, end }),
			}));
			i = j;
		}
		return out;
	}

	// ---- using / typedef ------------------------------------------------------

	private parseUsing(attrs: Attribute[], comment: string | undefined): Declaration {
		const kw = this.cur.next();
		const common = { attributes: attrs, ...(comment ? { comment } : {}) };
		if (this.cur.at('namespace')) {
			this.cur.next();
			const target = renderTokens(this.collectUntil(new Set([';']), 'head'));
			if (!target) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected namespace name after 'using namespace'");
			this.expectSemicolon();
			const node: UsingDecl = { kind: 'Using', name: target, ...common, span: this.cur.spanFrom(kw.span.start), target, isNamespace: true };
			return freezeDeclaration(node);
		}
		const t = this.cur.peek();
		if (t.kind === 'identifier' && (this.cur.at('=', 1) || isPunct(this.cur.peek(1), '['))) {
			this.cur.next();
			this.skipStandardAttributes();
			if (!this.cur.maybe('=')) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected '=' in alias declaration");
			const target = this.collectUntil(new Set([';']), 'head');
			if (target.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), 'expected aliased type');
			this.expectSemicolon();
			const node: AliasDecl = { kind: 'Alias', name: t.text, ...common, span: this.cur.spanFrom(kw.span.start), form: 'using', target: renderTokens(target) };
			return freezeDeclaration(node);
		}
		this.cur.maybe('typename');
		const targetToks = this.collectUntil(new Set([';']), 'head');
		const target = renderTokens(targetToks);
		if (!target) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected name after 'using'");
		this.expectSemicolon();
		const last = targetToks[targetToks.length - 1];
		const node: UsingDecl = { kind: 'Using', name: last ? last.text : target, ...common, span: this.cur.spanFrom(kw.span.start), target, isNamespace: false };
		return freezeDeclaration(node);
	}

	private parseTypedef(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration[] {
		const kw = this.cur.next();
		const inner = this.parseDeclaration(ctx, [], undefined);
		return inner.map((d): Declaration => {
			if (d.kind === 'Variable') {
				const alias: AliasDecl = { kind: 'Alias', name: d.name, attributes: attrs, span: spanFrom(kw.span.start, d.span.end), ...(comment ? { comment } : {}), form: 'typedef', target: d.type };
				return freezeDeclaration(alias);
			}
			if (d.kind === 'Function') {
				const target = `${d.returnType ?? ''}(${d.parameters.map(p => p.type).join(', ')})`;
				const alias: AliasDecl = { kind: 'Alias', name: d.name, attributes: attrs, span: spanFrom(kw.span.start, d.span.end), ...(comment ? { comment } : {}), form: 'typedef', target };
				return freezeDeclaration(alias);
			}
			// `typedef struct {...} Name;` keeps the struct itself
			return d;
		});
	}

	// ---- functions and variables ------------------------------------------------

	private parseFunctionOrVariable(ctx: ScopeContext, attrs: Attribute[], comment: string | undefined): Declaration[] {
		const head = this.parseHead(constructorName(ctx));
		const declAttrs = head.macros.length > 0 ? [...attrs, ...head.macros] : attrs;
		const stop = this.cur.peek();
		if (!head.name) {
			if (isPunct(stop, '(') && DECLARATOR_OPS.has(this.cur.peek(1).text) && head.typeTokens.length > 0) {
				return [this.parseFunctionPointer(head, declAttrs, comment)];
			}
			const at = head.typeTokens.length > 0 ? stop : this.cur.peek();
			if (head.typeTokens.length === 0 && head.leading.length === 0) {
				throw new ParseError('UnknownConstruct', at, `unexpected ${at.kind === 'eof' ? 'end of input' : `'${at.text}'`}; expected a declaration`);
			}
			throw new ParseError('LexicalMismatch', at, 'expected declarator name');
		}
		if (isPunct(stop, '(')) return [this.parseFunctionRest(ctx, head, head.name, declAttrs, comment)];
		if (head.typeTokens.length === 0) {
			throw new ParseError('UnknownConstruct', head.name.tokens[0] ?? stop, `'${head.name.last}' does not start a declaration`);
		}
		const quals = head.leading.filter(isVariableQualifier);
		return this.parseDeclaratorList(head.start, '', head.typeTokens, quals, head.name, declAttrs, comment);
	}

	/**
	 * Leading specifiers, type tokens and the declarator name, up to `(`, `;`, `=`, ...
	 * `ctorName` is read as a name even when it is shaped like a macro call (`RGB(int)`).
	 */
	private parseHead(ctorName?: string): DeclHead {
		const start = this.cur.peek().span.start;
		const leading: string[] = [];
		const typeTokens: Token[] = [];
		const macros: Attribute[] = [];
		let name: QualifiedName | undefined;
		const flushName = () => { if (name) { typeTokens.push(...name.tokens); name = undefined; } };
		for (; ;) {
			this.skipStandardAttributes();
			const t = this.cur.peek();
			if (t.kind === 'eof') break;
			if (t.kind === 'keyword' && LEADING_SPECIFIERS.has(t.text) && !name && typeTokens.length === 0) {
				this.cur.next();
				leading.push(t.text);
				if (t.text === 'explicit' && this.cur.at('(')) this.skipParenGroup();
				if (t.text === 'extern' && this.cur.peek().kind === 'literal') this.cur.next();
				continue;
			}
			if (t.kind === 'identifier' && isExportMacro(t.text) && !name && typeTokens.length === 0) { this.cur.next(); continue; }
			if (t.kind === 'punctuation' && HEAD_STOPS.has(t.text)) break;
			if (t.kind === 'identifier' && (t.text === '__attribute__' || t.text === '__declspec') && this.cur.at('(', 1)) {
				this.cur.next();
				this.skipParenGroup();
				continue;
			}
			if (t.kind === 'identifier' || isPunct(t, '::') || (isPunct(t, '~') && isNameToken(this.cur.peek(1))) || (t.kind === 'keyword' && t.text === 'operator')) {
				flushName();
				name = this.readQualifiedName();
				if (name.isConversion || name.isOperator) break;
				continue;
			}
			if (isMacroToken(t)) {
				if ((name || typeTokens.length > 0 || (t.kind === 'unknown-macro' && t.text === ctorName)) && this.cur.at('(', 1)) {
					// ALL_CAPS function name in declarator position: `void DO_THING(int);`, `RGB(int);`
					flushName();
					name = this.readQualifiedName();
					continue;
				}
				const a = this.attrs.captureOne();
				if (a) macros.push(a);
				continue;
			}
			if (t.kind === 'keyword' && (t.text === 'decltype' || t.text === 'alignas')) {
				flushName();
				typeTokens.push(this.cur.next());
				if (this.cur.at('(')) typeTokens.push(...this.takeParenGroup());
				continue;
			}
			if ((t.kind === 'keyword' && (isTypeKeyword(t.text) || CV.has(t.text) || ELABORATED.has(t.text))) || (t.kind === 'punctuation' && DECLARATOR_OPS.has(t.text))) {
				flushName();
				typeTokens.push(this.cur.next());
				continue;
			}
			if (t.kind === 'keyword' && LEADING_SPECIFIERS.has(t.text)) {
				// `int static x;`, `void inline f();`
				this.cur.next();
				leading.push(t.text);
				continue;
			}
			break;
		}
		return { start, leading, typeTokens, macros, ...(name ? { name } : {}) };
	}

	private readQualifiedName(): QualifiedName {
		const tokens: Token[] = [];
		const segments: string[] = [];
		let isDestructor = false;
		let isOperator = false;
		let isConversion = false;
		if (this.cur.at('::')) tokens.push(this.cur.next());
		for (; ;) {
			const t = this.cur.peek();
			let seg: string;
			if (isPunct(t, '~') && isNameToken(this.cur.peek(1))) {
				const tilde = this.cur.next();
				const id = this.cur.next();
				tokens.push(tilde, id);
				seg = '~' + id.text;
				isDestructor = true;
			} else if (t.kind === 'keyword' && t.text === 'operator') {
				const op = this.readOperatorName();
				tokens.push(...op.tokens);
				seg = op.name;
				isOperator = !op.conversion;
				isConversion = op.conversion;
			} else if (t.kind === 'identifier' || isMacroToken(t)) {
				tokens.push(this.cur.next());
				seg = t.text;
				if (this.cur.at('<')) {
					const args = this.captureAngle();
					tokens.push(...args);
					seg += renderTokens(args);
				}
			} else {
				throw new ParseError('LexicalMismatch', t, 'expected a name');
			}
			segments.push(seg);
			if (isOperator || isConversion) break;
			const n = this.cur.peek(1);
			const continues = this.cur.at('::') && (n.kind === 'identifier' || isPunct(n, '~') || (n.kind === 'keyword' && (n.text === 'operator' || n.text === 'template')) || isMacroToken(n));
			if (!continues) break;
			tokens.push(this.cur.next());
			if (this.cur.at('template')) this.cur.next();
		}
		const last = segments[segments.length - 1] ?? '';
		return { tokens, segments, last, isDestructor, isOperator, isConversion };
	}

	private readOperatorName(): { tokens: Token[]; name: string; conversion: boolean } {
		const kw = this.cur.next();
		const tokens: Token[] = [kw];
		const t = this.cur.peek();
		if (isPunct(t, '(') && this.cur.at(')', 1)) {
			tokens.push(this.cur.next(), this.cur.next());
			return { tokens, name: 'operator()', conversion: false };
		}
		if (isPunct(t, '[') && this.cur.at(']', 1)) {
			tokens.push(this.cur.next(), this.cur.next());
			return { tokens, name: 'operator[]', conversion: false };
		}
		if (t.kind === 'keyword' && (t.text === 'new' || t.text === 'delete')) {
			tokens.push(this.cur.next());
			let name = `operator ${t.text}`;
			if (this.cur.at('[') && this.cur.at(']', 1)) { tokens.push(this.cur.next(), this.cur.next()); name += '[]'; }
			return { tokens, name, conversion: false };
		}
		if (t.kind === 'literal' && this.cur.peek(1).kind === 'identifier') {
			tokens.push(this.cur.next());
			const suffix = this.cur.next();
			tokens.push(suffix);
			return { tokens, name: `operator""${suffix.text}`, conversion: false };
		}
		if (t.kind === 'literal' && /^""[A-Za-z_]/.test(t.text)) {
			tokens.push(this.cur.next());
			return { tokens, name: `operator${t.text}`, conversion: false };
		}
		if (t.kind === 'punctuation' && !isPunct(t, '(') && !isPunct(t, ';') && !isPunct(t, '{')) {
			tokens.push(this.cur.next());
			return { tokens, name: `operator${t.text}`, conversion: false };
		}
		// conversion operator: `operator bool`, `operator const char*`
		const typeToks = this.collectUntil(new Set(['(']), 'head');
		if (typeToks.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected operator symbol or conversion type after 'operator'");
		tokens.push(...typeToks);
		return { tokens, name: `operator ${renderTokens(typeToks)}`, conversion: true };
	}

	private parseFunctionRest(ctx: ScopeContext, head: DeclHead, name: QualifiedName, attrs: Attribute[], comment: string | undefined): FunctionDecl {
		this.cur.next(); // '('
		const { parameters, isVariadic } = this.parseParameterList();
		const qualifiers: FunctionQualifier[] = [];
		const addQual = (q: FunctionQualifier) => { if (!qualifiers.includes(q)) qualifiers.push(q); };
		for (const q of head.leading) if (isFunctionQualifier(q)) addQual(q);
		const trailingAttrs: Attribute[] = [];
		let specifier: FunctionDecl['specifier'];
		let trailingReturnType: string | undefined;
		let memberInitializers: string[] = [];
		for (; ;) {
			this.skipStandardAttributes();
			const t = this.cur.peek();
			if (t.kind === 'keyword' && t.text === 'const') { this.cur.next(); addQual('const'); continue; }
			if (t.kind === 'keyword' && t.text === 'volatile') { this.cur.next(); continue; }
			if (isPunct(t, '&') || isPunct(t, '&&')) { this.cur.next(); continue; }
			if (t.kind === 'keyword' && t.text === 'noexcept') { this.cur.next(); addQual('noexcept'); if (this.cur.at('(')) this.skipParenGroup(); continue; }
			if (t.kind === 'keyword' && t.text === 'throw' && this.cur.at('(', 1)) { this.cur.next(); this.skipParenGroup(); continue; }
			if (t.kind === 'identifier' && (t.text === 'override' || t.text === 'final')) { this.cur.next(); addQual(t.text === 'override' ? 'override' : 'final'); continue; }
			if (isPunct(t, '->')) {
				this.cur.next();
				const toks = this.collectUntil(new Set(['{', ';', '=']), 'head');
				if (toks.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected trailing return type after '->'");
				trailingReturnType = renderTokens(toks);
				continue;
			}
			if (isMacroToken(t)) {
				const a = this.attrs.captureOne(true);
				if (a) trailingAttrs.push(a);
				continue;
			}
			if (t.kind === 'keyword' && t.text === 'requires') {
				this.cur.next();
				this.collectUntil(new Set(['{', ';', '=']), 'head');
				continue;
			}
			if (isPunct(t, '=')) {
				const v = this.cur.peek(1);
				if (v.text === '0') specifier = 'pure';
				else if (v.text === 'default') specifier = 'default';
				else if (v.text === 'delete') specifier = 'delete';
				else throw new ParseError('LexicalMismatch', v, "expected '0', 'default' or 'delete' after '='");
				this.cur.next();
				this.cur.next();
				continue;
			}
			if (isPunct(t, ':') && memberInitializers.length === 0) {
				memberInitializers = this.parseMemberInitializers();
				continue;
			}
			break;
		}
		const role = this.functionRole(ctx, head, name);
		let body: Span | undefined;
		const t = this.cur.peek();
		if (isPunct(t, '{')) {
			const block = this.cur.skipBalanced('{', '}');
			if (!block.closed) throw new ParseError('UnbalancedDelimiter', block.span, `missing '}' to close body of '${name.last}'`, true);
			body = block.span;
		} else {
			this.expectSemicolon();
		}
		const returnType = head.typeTokens.length > 0 ? renderTokens(head.typeTokens) : undefined;
		const node: FunctionDecl = {
			kind: 'Function',
			name: name.last,
			attributes: [...attrs, ...trailingAttrs],
			span: this.cur.spanFrom(head.start),
			...(comment ? { comment } : {}),
			role,
			scope: name.segments.slice(0, -1),
			...(returnType !== undefined ? { returnType } : {}),
			...(trailingReturnType !== undefined ? { trailingReturnType } : {}),
			parameters,
			isVariadic,
			qualifiers,
			...(specifier ? { specifier } : {}),
			memberInitializers,
			isDefinition: body !== undefined,
			...(body ? { body } : {}),
		};
		return freezeDeclaration(node);
	}

	private functionRole(ctx: ScopeContext, head: DeclHead, name: QualifiedName): FunctionRole {
		if (name.isDestructor) return 'destructor';
		if (name.isConversion) return 'conversion';
		if (name.isOperator) return 'operator';
		const cls = enclosingClass(ctx);
		if (head.typeTokens.length === 0) {
			const qualifier = name.segments[name.segments.length - 2];
			if (cls && name.segments.length === 1 && name.last === stripTemplateArgs(cls.name)) return 'constructor';
			if (qualifier !== undefined && name.last === stripTemplateArgs(qualifier)) return 'constructor';
		}
		return cls ? 'method' : 'function';
	}

	private parseParameterList(): { parameters: Parameter[]; isVariadic: boolean } {
		// we are after '('
		const parameters: Parameter[] = [];
		let isVariadic = false;
		if (this.cur.maybe(')')) return { parameters, isVariadic };
		if (this.cur.at('void') && this.cur.at(')', 1)) { this.cur.next(); this.cur.next(); return { parameters, isVariadic }; }
		for (; ;) {
			if (this.cur.at('...') && this.cur.at(')', 1)) { this.cur.next(); this.cur.next(); isVariadic = true; break; }
			const collected = this.attrs.collect();
			const toks = this.collectUntil(new Set([',', ')']), 'always');
			const stop = this.cur.peek();
			if (!isPunct(stop, ',') && !isPunct(stop, ')')) {
				throw new ParseError('UnbalancedDelimiter', stop, "missing ')' to close parameter list", stop.kind === 'eof');
			}
			if (toks.length === 0) throw new ParseError('LexicalMismatch', stop, 'expected parameter declaration');
			parameters.push(toParameter(toks, [...collected.declaration, ...collected.body]));
			if (this.cur.maybe(',')) continue;
			this.cur.next(); // ')'
			break;
		}
		return { parameters, isVariadic };
	}

	private parseMemberInitializers(): string[] {
		this.cur.next(); // ':'
		const names: string[] = [];
		for (; ;) {
			const t = this.cur.peek();
			if (t.kind !== 'identifier' && !isPunct(t, '::')) throw new ParseError('LexicalMismatch', t, 'expected member name in initializer list');
			const name = this.readQualifiedName();
			if (this.cur.at('(')) this.skipParenGroup();
			else if (this.cur.at('{')) {
				const group = this.cur.skipBalanced('{', '}');
				if (!group.closed) throw new ParseError('UnbalancedDelimiter', group.span, "missing '}' in member initializer", true);
			} else throw new ParseError('LexicalMismatch', this.cur.peek(), `expected '(' or '{' after '${renderTokens(name.tokens)}'`);
			this.cur.maybe('...');
			names.push(renderTokens(name.tokens));
			if (!this.cur.maybe(',')) break;
		}
		return names;
	}

	private parseFunctionPointer(head: DeclHead, attrs: Attribute[], comment: string | undefined): VariableDecl {
		this.cur.next(); // '('
		const ptr: Token[] = [];
		while (DECLARATOR_OPS.has(this.cur.peek().text) || CV.has(this.cur.peek().text)) ptr.push(this.cur.next());
		const nameTok = this.cur.peek();
		if (nameTok.kind !== 'identifier') throw new ParseError('LexicalMismatch', nameTok, 'expected declarator name');
		this.cur.next();
		if (!this.cur.maybe(')')) throw new ParseError('LexicalMismatch', this.cur.peek(), "expected ')' after declarator name");
		let suffix = '';
		if (this.cur.at('(')) suffix = renderTokens(this.takeParenGroup());
		const type = `${renderTokens(head.typeTokens)} (${ptr.map(t => t.text).join('')})${suffix}`;
		const initializer = this.parseInitializer();
		this.expectSemicolon();
		const quals = head.leading.filter(isVariableQualifier);
		const node: VariableDecl = {
			kind: 'Variable',
			name: nameTok.text,
			attributes: attrs,
			span: this.cur.spanFrom(head.start),
			...(comment ? { comment } : {}),
			type,
			qualifiers: quals,
			...(initializer ? { initializer } : {}),
		};
		return freezeDeclaration(node);
	}

	/**
	 * Variables sharing one type: `int a = 1, *b, c[4];`. The first declarator may come
	 * from a parsed head (`typeTokens` + `first`), or follow a class body (`baseType`).
	 */
	private parseDeclaratorList(start: number, baseType: string, typeTokens: Token[], quals: VariableQualifier[], first: QualifiedName | undefined, attrs: Attribute[] = [], comment?: string): VariableDecl[] {
		const out: VariableDecl[] = [];
		// type shared by later declarators: drop the first declarator's own pointer/ref/cv tail
		let shared = typeTokens.length;
		while (shared > 0) {
			const t = typeTokens[shared - 1];
			if (!t || !(DECLARATOR_OPS.has(t.text) || t.text === 'const' || t.text === 'volatile')) break;
			shared--;
		}
		const sharedType = typeTokens.length > 0 ? renderTokens(typeTokens.slice(0, shared)) : baseType;
		const leadingConst = typeTokens[0]?.text === 'const';
		let pending: { name: string; type: string; isConst: boolean } | undefined = first
			? { name: first.last, type: renderTokens(typeTokens), isConst: leadingConst || typeTokens[typeTokens.length - 1]?.text === 'const' }
			: undefined;
		for (; ;) {
			if (!pending) {
				const ops: Token[] = [];
				while (DECLARATOR_OPS.has(this.cur.peek().text) || CV.has(this.cur.peek().text)) ops.push(this.cur.next());
				const nameTok = this.cur.peek();
				if (nameTok.kind !== 'identifier') throw new ParseError('LexicalMismatch', nameTok, 'expected declarator name');
				this.cur.next();
				pending = { name: nameTok.text, type: sharedType + ops.map(t => t.text).join(''), isConst: leadingConst || ops[ops.length - 1]?.text === 'const' };
			}
			let type = pending.type;
			while (this.cur.at('[')) type += renderTokens(this.takeGroup('[', ']'));
			let bitWidth: string | undefined;
			if (this.cur.at(':')) {
				this.cur.next();
				const toks = this.collectUntil(new Set([',', ';', '=', '{']), 'never');
				if (toks.length === 0) throw new ParseError('LexicalMismatch', this.cur.peek(), 'expected bit-field width');
				bitWidth = renderTokens(toks);
			}
			const initializer = this.parseInitializer();
			const qualifiers: VariableQualifier[] = [...quals];
			if (pending.isConst && !qualifiers.includes('const')) qualifiers.push('const');
			const node: VariableDecl = {
				kind: 'Variable',
				name: pending.name,
				attributes: out.length === 0 ? attrs : [],
				span: this.cur.spanFrom(start),
				...(comment && out.length === 0 ? { comment } : {}),
				type,
				qualifiers,
				...(initializer ? { initializer } : {}),
				...(bitWidth !== undefined ? { bitWidth } : {}),
			};
			out.push(freezeDeclaration(node));
			pending = undefined;
			if (this.cur.maybe(',')) continue;
			break;
		}
		this.expectSemicolon();
		return out;
	}

	private parseInitializer(): Span | undefined {
		if (this.cur.at('=')) {
			const eq = this.cur.next();
			const toks = this.collectUntil(new Set([',', ';']), 'never');
			const first = toks[0];
			const last = toks[toks.length - 1];
			if (!first || !last) throw new ParseError('LexicalMismatch', eq, "expected initializer after '='");
			return spanFrom(first.span.start, last.span.end);
		}
		if (this.cur.at('{')) {
			const block = this.cur.skipBalanced('{', '}');
			if (!block.closed) throw new ParseError('UnbalancedDelimiter', block.span, "missing '}' to close initializer", true);
			return block.span;
		}
		return undefined;
	}

	// ---- token helpers ----------------------------------------------------------

	/**
	 * Insertion recovery for a missing `;` after a complete declaration: report and go on
	 * when the next token starts a new line of declarations, otherwise fail.
	 */
	private expectSemicolon() {
		if (this.cur.maybe(';')) return;
		const t = this.cur.peek();
		if (t.kind === 'eof' || isPunct(t, '}') || t.kind === 'identifier' || t.kind === 'keyword' || isMacroToken(t)) {
			this.recovery.report('LexicalMismatch', spanFrom(this.cur.end, Math.max(this.cur.end + 1, t.span.start)), "expected ';'");
			return;
		}
		throw new ParseError('LexicalMismatch', t, `expected ';' but found '${t.text}'`);
	}

	private skipStandardAttributes() {
		while (this.cur.at('[') && this.cur.at('[', 1)) {
			const group = this.cur.skipBalanced('[', ']');
			if (!group.closed) throw new ParseError('UnbalancedDelimiter', group.span, "missing ']]' to close attribute", true);
		}
	}

	private skipParenGroup() {
		this.takeParenGroup();
	}

	private takeParenGroup(): Token[] {
		return this.takeGroup('(', ')');
	}

	private takeGroup(open: '(' | '[', close: ')' | ']'): Token[] {
		const out: Token[] = [];
		let depth = 0;
		const first = this.cur.peek();
		for (; ;) {
			const t = this.cur.peek();
			if (t.kind === 'eof') throw new ParseError('UnbalancedDelimiter', spanFrom(first.span.start, Math.max(this.cur.end, first.span.end)), `missing '${close}'`, true);
			if (depth > 0 && (isPunct(t, ';') || isPunct(t, '{') || isPunct(t, '}')) && open === '[') {
				throw new ParseError('UnbalancedDelimiter', t, `missing '${close}'`);
			}
			out.push(this.cur.next());
			if (isPunct(t, open)) depth++;
			else if (isPunct(t, close)) { depth--; if (depth === 0) return out; }
		}
	}

	/**
	 * `<...>` after a name is always a template argument list; `>>` closes two levels.
	 * Returns the tokens including both brackets.
	 */
	private captureAngle(): Token[] {
		const open = this.cur.next();
		const out: Token[] = [open];
		let depth = 1;
		for (; ;) {
			const t = this.cur.peek();
			if (t.kind === 'eof' || isPunct(t, ';') || isPunct(t, '{') || isPunct(t, '}')) {
				throw new ParseError('UnbalancedDelimiter', open, "missing '>' to close template argument list", t.kind === 'eof');
			}
			if (isPunct(t, '>>')) {
				if (depth >= 2) { out.push(this.cur.next()); depth -= 2; if (depth === 0) return out; continue; }
				this.cur.splitShiftRight();
				continue;
			}
			if (isPunct(t, '(')) { out.push(...this.takeParenGroup()); continue; }
			out.push(this.cur.next());
			if (isPunct(t, '<')) depth++;
			else if (isPunct(t, '>')) { depth--; if (depth === 0) return out; }
		}
	}

	/**
	 * Collect tokens up to a top-level stop token (left unconsumed). Nested (), [] and {}
	 * are kept whole, and so are template argument lists after a name as `angles` allows.
	 * Stops early at an unmatched closer, or at `;`/`}` outside any group.
	 */
	private collectUntil(stops: ReadonlySet<string>, angles: AngleRule): Token[] {
		const out: Token[] = [];
		const closers: string[] = [];
		// under 'head', `<` compares once a top-level `=` starts an expression
		let inExpression = false;
		for (; ;) {
			const t = this.cur.peek();
			if (t.kind === 'eof') return out;
			if (t.kind === 'punctuation') {
				if (closers.length === 0 && stops.has(t.text)) return out;
				if (closers.length === 0 && t.text === '=') inExpression = true;
				if (closers.length === 0 && (t.text === ';' || t.text === '}')) return out;
				if (t.text === '(') closers.push(')');
				else if (t.text === '[') closers.push(']');
				else if (t.text === '{') closers.push('}');
				else if (t.text === ')' || t.text === ']' || t.text === '}') {
					if (closers.length === 0) return out;
					closers.pop();
				} else if (t.text === '<' && closers.length === 0 && (angles === 'always' || (angles === 'head' && !inExpression))) {
					const prev = out[out.length - 1];
					if (prev && (prev.kind === 'identifier' || prev.kind === 'keyword' || isMacroToken(prev))) {
						out.push(...this.captureAngle());
						continue;
					}
				}
			}
			out.push(this.cur.next());
		}
	}
}

/** Template parameter groups: split on top-level commas, treating `<...>` as nesting. */
function splitTopLevelAngles(tokens: Token[]): Token[][] {
	const groups: Token[][] = [];
	let current: Token[] = [];
	let depth = 0;
	for (const t of tokens) {
		if (t.kind === 'punctuation') {
			if (t.text === '<' || t.text === '(' || t.text === '[' || t.text === '{') depth++;
			else if (t.text === '>' || t.text === ')' || t.text === ']' || t.text === '}') depth--;
			else if (t.text === '>>') depth -= 2;
			else if (t.text === ',' && depth === 0) { groups.push(current); current = []; continue; }
		}
		current.push(t);
	}
	groups.push(current);
	return groups;
}

/** `const std::string& name = "x"`, `int values[]`, `void (*cb)(int)`, `Args... args` */
function toParameter(tokens: Token[], attributes: Attribute[]): Parameter {
	const eq = tokens.findIndex((t, i) => isPunct(t, '=') && depthAt(tokens, i) === 0);
	const decl = eq < 0 ? tokens : tokens.slice(0, eq);
	const defaultValue = eq < 0 ? undefined : renderTokens(tokens.slice(eq + 1));
	const frozenAttrs = Object.freeze([...attributes]);
	const withDefault = defaultValue !== undefined ? { defaultValue } : {};
	// function pointer: type ( * name ) ( params )
	const open = decl.findIndex((t, i) => isPunct(t, '(') && i > 0 && DECLARATOR_OPS.has(decl[i + 1]?.text ?? ''));
	if (open > 0) {
		const nameIdx = decl.findIndex((t, i) => i > open && t.kind === 'identifier');
		const nameTok = decl[nameIdx];
		if (nameTok && isPunct(decl[nameIdx + 1], ')')) {
			const type = renderTokens(decl.slice(0, nameIdx)) + renderTokens(decl.slice(nameIdx + 1));
			return { name: nameTok.text, type, ...withDefault, attributes: frozenAttrs };
		}
	}
	let end = decl.length;
	let arraySuffix = '';
	// array parameter: int values[4]
	while (end > 0 && isPunct(decl[end - 1], ']')) {
		const openIdx = findLastIndex(decl, t => isPunct(t, '['), end - 1);
		if (openIdx < 0) break;
		arraySuffix = renderTokens(decl.slice(openIdx, end)) + arraySuffix;
		end = openIdx;
	}
	const last = decl[end - 1];
	const beforeLast = decl[end - 2];
	const hasName = end > 1 && last !== undefined && last.kind === 'identifier' && !isPunct(beforeLast, '::');
	if (!hasName || !last) return { name: '', type: renderTokens(decl), ...withDefault, attributes: frozenAttrs };
	return { name: last.text, type: renderTokens(decl.slice(0, end - 1)) + arraySuffix, ...withDefault, attributes: frozenAttrs };
}

function isNameToken(t: Token): boolean {
	return t.kind === 'identifier' || isMacroToken(t);
}

function depthAt(tokens: Token[], index: number): number {
	let depth = 0;
	for (let i = 0; i < index; i++) {
		const t = tokens[i];
		if (!t || t.kind !== 'punctuation') continue;
		if (t.text === '(' || t.text === '[' || t.text === '{' || t.text === '<') depth++;
		else if (t.text === ')' || t.text === ']' || t.text === '}' || t.text === '>') depth--;
		else if (t.text === '>>') depth -= 2;
	}
	return depth;
}

function findLastIndex<T>(arr: readonly T[], pred: (t: T) => boolean, before: number): number {
	for (let i = before - 1; i >= 0; i--) {
		const v = arr[i];
		if (v !== undefined && pred(v)) return i;
	}
	return -1;
}
