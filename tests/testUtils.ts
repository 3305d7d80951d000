import path from 'node:path';
import fs from 'node:fs/promises';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { parseSource, type ParseOptions, type ParseResult } from '../src/ast/parser';
import type { ClassDecl, Declaration, EnumDecl, FunctionDecl, NamespaceDecl, TemplateDecl, VariableDecl } from '../src/ast/types';

export function docFrom(code: string, uri = 'file:///test.h') {
	return TextDocument.create(uri, 'cpp', 1, code);
}

export function fixturePath(rel: string) {
	return path.join(__dirname, 'fixtures', rel);
}

export async function readFixture(rel: string) {
	return fs.readFile(fixturePath(rel), 'utf8');
}

export async function parseFixture(rel: string, opts?: ParseOptions): Promise<ParseResult> {
	return parseSource(await readFixture(rel), { file: rel, ...opts });
}

function isKind<K extends Declaration['kind']>(d: Declaration | undefined, kind: K): d is Extract<Declaration, { kind: K }> {
	return !!d && d.kind === kind;
}

// Narrowing lookups: fail the test with a readable message instead of returning undefined.
function expectKind<K extends Declaration['kind']>(d: Declaration | undefined, kind: K, what: string): Extract<Declaration, { kind: K }> {
	if (!isKind(d, kind)) throw new Error(`expected ${kind} for ${what}, got ${d ? d.kind : 'nothing'}`);
	return d;
}

export function child<K extends Declaration['kind']>(list: readonly Declaration[], kind: K, name: string): Extract<Declaration, { kind: K }> {
	return expectKind(list.find(d => d.kind === kind && d.name === name), kind, `'${name}'`);
}

export function at<K extends Declaration['kind']>(list: readonly Declaration[], index: number, kind: K): Extract<Declaration, { kind: K }> {
	return expectKind(list[index], kind, `index ${index}`);
}

export function membersOf(decl: ClassDecl): Declaration[] {
	return decl.members.map(m => m.declaration);
}

export function functions(list: readonly Declaration[]): FunctionDecl[] {
	return list.filter((d): d is FunctionDecl => d.kind === 'Function');
}

export function variables(list: readonly Declaration[]): VariableDecl[] {
	return list.filter((d): d is VariableDecl => d.kind === 'Variable');
}

export function namespaceAt(list: readonly Declaration[], name: string): NamespaceDecl { return child(list, 'Namespace', name); }
export function classAt(list: readonly Declaration[], name: string): ClassDecl { return child(list, 'Class', name); }
export function templateAt(list: readonly Declaration[], name: string): TemplateDecl { return child(list, 'Template', name); }
export function enumAt(list: readonly Declaration[], name: string): EnumDecl { return child(list, 'Enum', name); }

const POSITIONAL_KEYS = new Set(['span', 'body', 'initializer']);

/** Deep copy without source positions, for comparing trees parsed from different text. */
export function stripSpans(value: unknown): unknown {
	if (Array.isArray(value)) return value.map(stripSpans);
	if (value && typeof value === 'object') {
		const out: Record<string, unknown> = {};
		for (const [k, v] of Object.entries(value)) {
			if (POSITIONAL_KEYS.has(k)) continue;
			out[k] = stripSpans(v);
		}
		return out;
	}
	return value;
}
