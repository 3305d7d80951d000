export { parseTokens, parseSource, parseDocument, collectIncludes, type ParseOptions, type ParseResult } from './ast/parser';
export { tokenize, Tokenizer } from './core/tokenizer';
export type { RawToken, RawTokenKind } from './core/tokens';
export { classifyToken, classifyTokens, isKeyword } from './ast/classifier';
export { DEFAULT_MACRO_TABLE, createMacroTable, isMacroShaped, type MacroPlacement, type MacroSpec, type MacroTable } from './ast/macros';
export { walkDeclarations, flattenSymbols, findDeclaration, childrenOf, type FlatSymbol, type Visitor, type WalkContext } from './ast/walk';
export * from './ast/types';
export { CPP_DIAGCODES, ERROR_KIND_INFO, normalizeDiagCode, type DiagCode, type Diagnostic, type ErrorKind, type Severity } from './analysisTypes';
export { parseDisabledDiagList, filterDiagnostics } from './diagSettings';
export { loadMacroTable, parseMacroProfile, profileToTable, type MacroProfile, type MacroProfileEntry } from './config';
export { documentSymbols, spanToRange } from './symbols';
export { toLspDiagnostics, DIAGNOSTIC_SOURCE } from './diagnostics';
