import { type Diagnostic as LspDiagnostic, DiagnosticSeverity } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Diagnostic, DiagCode } from './analysisTypes';
import { filterDiagnostics } from './diagSettings';
import { spanToRange } from './symbols';

export const DIAGNOSTIC_SOURCE = 'cpp-decl';

export function toLspDiagnostics(doc: TextDocument, diags: ReadonlyArray<Diagnostic>, disabled: ReadonlySet<DiagCode> = new Set()): LspDiagnostic[] {
	return filterDiagnostics(diags, disabled).map(d => ({
		range: spanToRange(doc, d.span),
		severity: d.severity === 'error' ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
		message: d.message,
		source: DIAGNOSTIC_SOURCE,
		code: d.code,
	}));
}
