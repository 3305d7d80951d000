import type { Span } from './core/tokens';

export const CPP_DIAGCODES = {
	LEXICAL_MISMATCH: 'CPP001',
	UNBALANCED_DELIMITER: 'CPP002',
	UNKNOWN_CONSTRUCT: 'CPP003',
	MACRO_ARGUMENT_MALFORMED: 'CPP004',
	PARSE_CANCELLED: 'CPP010',
} as const;
export type DiagCode = typeof CPP_DIAGCODES[keyof typeof CPP_DIAGCODES];

export type ErrorKind = 'LexicalMismatch' | 'UnbalancedDelimiter' | 'UnknownConstruct' | 'MacroArgumentMalformed' | 'ParseCancelled';

export const ERROR_KIND_INFO: Readonly<Record<ErrorKind, { code: DiagCode; severity: Severity }>> = {
	LexicalMismatch: { code: CPP_DIAGCODES.LEXICAL_MISMATCH, severity: 'error' },
	UnbalancedDelimiter: { code: CPP_DIAGCODES.UNBALANCED_DELIMITER, severity: 'error' },
	UnknownConstruct: { code: CPP_DIAGCODES.UNKNOWN_CONSTRUCT, severity: 'error' },
	MacroArgumentMalformed: { code: CPP_DIAGCODES.MACRO_ARGUMENT_MALFORMED, severity: 'warning' },
	ParseCancelled: { code: CPP_DIAGCODES.PARSE_CANCELLED, severity: 'warning' },
};

export type Severity = 'error' | 'warning';

export interface Diagnostic {
	readonly span: Span;
	readonly message: string;
	readonly severity: Severity;
	readonly code: DiagCode;
	readonly kind: ErrorKind;
	// set when recovery could not resynchronize and parsing stopped
	readonly fatal?: boolean;
}

const DIAG_VALUE_SET = new Set<string>(Object.values(CPP_DIAGCODES));

// Friendly aliases derived from the code table: `unknown-construct` -> CPP003.
// Error kind names (`UnknownConstruct`) canonicalize to the same alias.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(CPP_DIAGCODES)) {
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

function isDiagCode(s: string): s is DiagCode {
	return DIAG_VALUE_SET.has(s);
}

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.replace(/([a-z])([A-Z])/g, '$1-$2').toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}
