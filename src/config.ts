import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../common/macroTableSchema.json';
import { type MacroPlacement, type MacroSpec, type MacroTable, DEFAULT_MACRO_TABLE, createMacroTable } from './ast/macros';
import { debugLog } from './log';

export type MacroProfileEntry = string | { name: string; placement?: MacroPlacement };

export interface MacroProfile {
	name?: string;
	description?: string;
	// 'none' starts from an empty table instead of the Unreal defaults
	extends?: 'unreal' | 'none';
	macros: MacroProfileEntry[];
}

// Bundled profiles live in <root>/profiles; from dist/src that is two levels up.
const PROFILE_DIRS = [
	path.resolve(__dirname, '..', 'profiles'),
	path.resolve(__dirname, '..', '..', 'profiles'),
];

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateProfile = ajv.compile<MacroProfile>(schema);

function isBundledName(ref: string): boolean {
	return /^[A-Za-z0-9_-]+$/.test(ref);
}

async function readProfile(ref: string): Promise<{ raw: string; resolvedPath: string }> {
	const candidates: string[] = [];
	if (isBundledName(ref)) {
		for (const dir of PROFILE_DIRS) candidates.push(path.join(dir, `${ref}.yaml`));
	}
	candidates.push(path.isAbsolute(ref) ? ref : path.resolve(process.cwd(), ref));
	let lastErr: unknown;
	for (const candidate of candidates) {
		try {
			const raw = await fs.readFile(candidate, 'utf8');
			return { raw, resolvedPath: candidate };
		} catch (err) {
			lastErr = err;
		}
	}
	throw lastErr ?? new Error(`Macro profile "${ref}" could not be resolved`);
}

/** Validate an already-parsed profile object; throws with every schema error listed. */
export function parseMacroProfile(obj: unknown, source = '<inline>'): MacroProfile {
	if (obj === null || obj === undefined) {
		throw new Error(`Macro profile "${source}" appears to be empty or could not be parsed`);
	}
	if (!validateProfile(obj)) {
		const msg = (validateProfile.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new Error(`Macro profile "${source}" failed schema validation:\n${msg}`);
	}
	return obj;
}

export function profileToTable(profile: MacroProfile, base: MacroTable = DEFAULT_MACRO_TABLE): MacroTable {
	const specs = profile.macros.map((m): MacroSpec => typeof m === 'string'
		? { name: m, placement: 'declaration' }
		: { name: m.name, placement: m.placement ?? 'declaration' });
	return createMacroTable(specs, profile.extends === 'none' ? new Map<string, MacroSpec>() : base);
}

/**
 * Load a YAML macro profile and merge it into `base` (the Unreal table by default).
 * `ref` is a file path, or the name of a bundled profile such as `qt`.
 */
export async function loadMacroTable(ref: string, base: MacroTable = DEFAULT_MACRO_TABLE): Promise<MacroTable> {
	const { raw, resolvedPath } = await readProfile(ref);
	let obj: unknown;
	try {
		obj = yaml.load(raw, { json: true });
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new Error(`Macro profile "${resolvedPath}" is not valid YAML: ${reason}`);
	}
	const profile = parseMacroProfile(obj, resolvedPath);
	const table = profileToTable(profile, base);
	debugLog('config', `loaded ${profile.macros.length} macro(s) from ${resolvedPath}; table has ${table.size} entries`);
	return table;
}
