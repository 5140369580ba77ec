import {
	compileIssuePattern,
	type GateDefinition,
	type JsonFieldParsing,
	type TextRegexParsing,
} from '../parsers/index.js';
import { extractFields, resolvePointer } from './json-pointer.js';
import type { IIssue } from './types.js';

export interface IRawOutput {
	stdout: string;
	stderr: string;
	exit_code: number | null;
}

export interface IParsedOutput {
	issues: IIssue[];
	extracted_fields: Record<string, unknown>;
	/** The output could not be interpreted; success falls back to exit-code semantics. */
	fallback: boolean;
}

type Entry = Record<string, unknown>;

function isEntry(value: unknown): value is Entry {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | null {
	if (typeof value === 'string') return value;
	if (typeof value === 'number' && Number.isFinite(value)) return String(value);
	return null;
}

function asInt(value: unknown): number | null {
	if (typeof value === 'number' && Number.isInteger(value)) return value;
	if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value.trim());
	return null;
}

function asFlag(value: unknown): boolean {
	if (typeof value === 'boolean') return value;
	if (typeof value === 'string') return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
	return value === 1;
}

function firstDefined(...values: unknown[]): unknown {
	return values.find(v => v !== undefined && v !== null);
}

export function createIssue(fields: Partial<IIssue> & { message: string }): IIssue {
	return Object.freeze({
		code: fields.code ?? null,
		message: fields.message,
		line: fields.line ?? null,
		column: fields.column ?? null,
		file: fields.file ?? null,
		fixable: fields.fixable ?? false,
		...(fields.severity !== undefined ? { severity: fields.severity } : {}),
	});
}

/** Single issue standing in for a gate that produced no diagnostics of its own. */
export function failureIssue(message: string): IIssue {
	return createIssue({ message });
}

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
	if (!text.trim()) return { ok: false };
	try {
		return { ok: true, value: JSON.parse(text) };
	} catch {
		return { ok: false };
	}
}

/**
 * Normalizes one diagnostic from a tool's native JSON. Understands ruff
 * (`location.row`, `filename`, `fix.applicability`), pyright (`rule`,
 * zero-based `range.start`) and flat `file/line/column` records.
 */
export function normalizeDiagnostic(entry: Entry): IIssue {
	let line: number | null = null;
	let column: number | null = null;

	const location = entry.location;
	const range = entry.range;
	if (isEntry(location)) {
		line = asInt(location.row ?? location.line);
		column = asInt(location.column ?? location.col);
	} else if (isEntry(range) && isEntry(range.start)) {
		const startLine = asInt(range.start.line);
		const startChar = asInt(range.start.character);
		line = startLine === null ? null : startLine + 1;
		column = startChar === null ? null : startChar + 1;
	} else {
		line = asInt(entry.line);
		column = asInt(firstDefined(entry.column, entry.col));
	}

	const fix = entry.fix;
	const fixable = isEntry(fix) ? fix.applicability === 'safe' : asFlag(entry.fixable);
	const severity = asString(entry.severity);

	return createIssue({
		code: asString(firstDefined(entry.code, entry.rule, entry.ruleId)),
		message: asString(entry.message) ?? 'Unknown issue',
		line,
		column,
		file: asString(firstDefined(entry.filename, entry.file, entry.path, entry.filePath)),
		fixable,
		...(severity !== null ? { severity } : {}),
	});
}

/** Flat key, or `/`-separated nested key path inside one diagnostic. */
function resolveKeyPath(entry: Entry, path: string): unknown {
	let current: unknown = entry;
	for (const segment of path.split('/')) {
		if (!isEntry(current)) return undefined;
		current = current[segment];
	}
	return current;
}

function mapDiagnostic(entry: Entry, fieldMap: Record<string, string>): IIssue {
	const pick = (...keys: string[]): unknown => {
		const key = keys.find(k => fieldMap[k] !== undefined);
		return key === undefined ? undefined : resolveKeyPath(entry, fieldMap[key]);
	};
	const severity = asString(pick('severity'));

	return createIssue({
		code: asString(pick('code', 'rule')),
		message: asString(pick('message')) ?? 'Unknown issue',
		line: asInt(pick('line')),
		column: asInt(pick('column', 'col')),
		file: asString(pick('file')),
		fixable: asFlag(pick('fixable')),
		...(severity !== null ? { severity } : {}),
	});
}

function diagnosticsToIssues(diagnostics: unknown, fieldMap?: Record<string, string>): IIssue[] {
	if (!Array.isArray(diagnostics)) return [];
	return diagnostics
		.filter(isEntry)
		.map(entry => (fieldMap ? mapDiagnostic(entry, fieldMap) : normalizeDiagnostic(entry)));
}

function parseExitCode(raw: IRawOutput, producesJson: boolean): IParsedOutput {
	if (!producesJson) return { issues: [], extracted_fields: {}, fallback: false };

	const parsed = tryParseJson(raw.stdout);
	return {
		issues: parsed.ok ? diagnosticsToIssues(parsed.value) : [],
		extracted_fields: {},
		fallback: false,
	};
}

function parseJsonField(raw: IRawOutput, parsing: JsonFieldParsing): IParsedOutput {
	const input = raw.stdout.trim() ? raw.stdout : raw.stdout + raw.stderr;
	const parsed = tryParseJson(input);

	if (!parsed.ok) {
		return { issues: [], extracted_fields: extractFields(undefined, parsing.field_pointers), fallback: true };
	}

	const document = parsed.value;
	const diagnostics = parsing.diagnostics_path !== undefined
		? resolvePointer(document, parsing.diagnostics_path)
		: Array.isArray(document) ? document : undefined;

	return {
		issues: diagnosticsToIssues(diagnostics, parsing.field_map),
		extracted_fields: extractFields(document, parsing.field_pointers),
		fallback: false,
	};
}

function interpolate(template: string, groups: Record<string, string | undefined>): string {
	return template.replace(/\{(\w+)\}/g, (match, name: string) => groups[name] ?? match);
}

function parseTextRegex(raw: IRawOutput, parsing: TextRegexParsing): IParsedOutput {
	let pattern: RegExp;
	try {
		pattern = compileIssuePattern(parsing.regex, parsing.flags);
	} catch {
		return { issues: [], extracted_fields: {}, fallback: true };
	}

	const combined = [raw.stdout, raw.stderr].filter(Boolean).join('\n');
	const issues: IIssue[] = [];

	for (const line of combined.split(/\r?\n/)) {
		if (!line.trim()) continue;
		const match = pattern.exec(line);
		if (!match) continue;

		const captured: Record<string, string | undefined> = { ...match.groups };
		const value = (...names: string[]): string | undefined => {
			for (const name of names) {
				if (captured[name] !== undefined) return captured[name];
			}
			const fallbackName = names.find(n => parsing.defaults[n] !== undefined);
			return fallbackName === undefined ? undefined : interpolate(parsing.defaults[fallbackName], captured);
		};
		const severity = value('severity');

		issues.push(createIssue({
			code: value('code', 'rule') ?? null,
			message: value('message') ?? line.trim(),
			line: asInt(value('line')),
			column: asInt(value('column', 'col')),
			file: value('file') ?? null,
			fixable: asFlag(value('fixable')),
			...(severity !== undefined ? { severity } : {}),
		}));
	}

	return { issues, extracted_fields: {}, fallback: issues.length === 0 };
}

/**
 * Turns raw tool output into issues according to the gate's parsing strategy.
 * Never throws: output that cannot be interpreted yields zero issues.
 */
export function parseGateOutput(raw: IRawOutput, gate: GateDefinition): IParsedOutput {
	const { parsing } = gate;
	switch (parsing.strategy) {
		case 'exit_code':
			return parseExitCode(raw, gate.capabilities.produces_json);
		case 'json_field':
			return parseJsonField(raw, parsing);
		case 'text_regex':
			return parseTextRegex(raw, parsing);
		default: {
			const unreachable: never = parsing;
			return unreachable;
		}
	}
}
