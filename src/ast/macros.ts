// Reflection-macro table: which ALL_CAPS identifiers are annotations, and where their
// captured attribute attaches.

/**
 * - `declaration`: attaches to the declaration that follows (`UPROPERTY(...) float Health;`)
 * - `body`: attaches to the enclosing class/namespace (`GENERATED_BODY()`, `Q_OBJECT`)
 * - `trailing`: attaches to the item it follows (`Idle UMETA(DisplayName = "Idle")`)
 */
export type MacroPlacement = 'declaration' | 'body' | 'trailing';

export interface MacroSpec {
	name: string;
	placement: MacroPlacement;
}

export type MacroTable = ReadonlyMap<string, Readonly<MacroSpec>>;

const UNREAL_MACROS: readonly MacroSpec[] = [
	{ name: 'UCLASS', placement: 'declaration' },
	{ name: 'USTRUCT', placement: 'declaration' },
	{ name: 'UPROPERTY', placement: 'declaration' },
	{ name: 'UFUNCTION', placement: 'declaration' },
	{ name: 'UENUM', placement: 'declaration' },
	{ name: 'UINTERFACE', placement: 'declaration' },
	{ name: 'UDELEGATE', placement: 'declaration' },
	{ name: 'UPARAM', placement: 'declaration' },
	{ name: 'UMETA', placement: 'trailing' },
	{ name: 'GENERATED_BODY', placement: 'body' },
	{ name: 'GENERATED_USTRUCT_BODY', placement: 'body' },
	{ name: 'GENERATED_UCLASS_BODY', placement: 'body' },
	{ name: 'GENERATED_UINTERFACE_BODY', placement: 'body' },
	{ name: 'GENERATED_IINTERFACE_BODY', placement: 'body' },
];

function freezeTable(specs: Iterable<MacroSpec>): MacroTable {
	const map = new Map<string, Readonly<MacroSpec>>();
	for (const s of specs) map.set(s.name, Object.freeze({ ...s }));
	return map;
}

export const DEFAULT_MACRO_TABLE: MacroTable = freezeTable(UNREAL_MACROS);

/**
 * Extend the default table. Bare names get `declaration` placement; an entry may
 * also override the placement of a default entry.
 */
export function createMacroTable(extra: Iterable<string | MacroSpec> = [], base: MacroTable = DEFAULT_MACRO_TABLE): MacroTable {
	const specs: MacroSpec[] = [...base.values()];
	for (const e of extra) {
		specs.push(typeof e === 'string' ? { name: e, placement: 'declaration' } : e);
	}
	return freezeTable(specs);
}

const ALL_CAPS = /^[A-Z_][A-Z0-9_]*$/;

// ALL_CAPS identifier of at least two characters with at least one letter
export function isMacroShaped(word: string): boolean {
	return word.length >= 2 && ALL_CAPS.test(word) && /[A-Z]/.test(word);
}

// `MYGAME_API`-style export macros placed between `class` and the class name
export function isExportMacro(word: string): boolean {
	return isMacroShaped(word) && word.endsWith('_API');
}
