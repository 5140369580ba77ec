import type { SuccessSpec } from '../parsers/index.js';
import type { IParsedOutput } from './gate-parsers.js';
import type { IIssue } from './types.js';

export interface ISuccessVerdict {
	passed: boolean;
	score: string;
}

export const TIMEOUT_SCORE = 'Timeout';
export const NOT_FOUND_SCORE = 'Not Found';

export function violationsScore(count: number, issues: IIssue[]): string {
	const fixable = issues.filter(i => i.fixable).length;
	return `${count} violations, ${fixable} auto-fixable`;
}

function byExitCode(exitCode: number | null, success: SuccessSpec): ISuccessVerdict {
	const passed = exitCode !== null && success.exit_codes_ok.includes(exitCode);
	return { passed, score: passed ? 'Pass' : `Fail (exit=${exitCode ?? 'none'})` };
}

function errorCount(parsed: IParsedOutput): number {
	const explicit = parsed.extracted_fields.error_count;
	return typeof explicit === 'number' && Number.isFinite(explicit) ? explicit : parsed.issues.length;
}

/**
 * Applies a gate's success criteria. When parsing fell back, json_field and
 * regex modes are judged by exit code alone.
 */
export function evaluateSuccess(exitCode: number | null, parsed: IParsedOutput, success: SuccessSpec): ISuccessVerdict {
	switch (success.mode) {
		case 'exit_code':
			return byExitCode(exitCode, success);

		case 'json_field': {
			if (parsed.fallback) return byExitCode(exitCode, success);
			const count = errorCount(parsed);
			const requireNoIssues = success.require_no_issues ?? success.max_errors === undefined;
			const withinLimit = success.max_errors === undefined || count <= success.max_errors;
			const passed = withinLimit && (!requireNoIssues || parsed.issues.length === 0);
			const clean = count === 0 && parsed.issues.length === 0;
			return { passed, score: passed && clean ? 'Pass' : violationsScore(count, parsed.issues) };
		}

		case 'regex': {
			if (parsed.fallback) return byExitCode(exitCode, success);
			const passed = parsed.issues.length === 0;
			return { passed, score: passed ? 'Pass' : violationsScore(parsed.issues.length, parsed.issues) };
		}

		default: {
			const unreachable: never = success.mode;
			return unreachable;
		}
	}
}
