import { describe, it, expect } from 'vitest';
import { evaluateSuccess } from '../success-evaluator.js';
import { createIssue, type IParsedOutput } from '../gate-parsers.js';
import type { SuccessSpec } from '../../parsers/index.js';

function parsed(issueCount: number, fields: Record<string, unknown> = {}, fallback = false, fixable = 0): IParsedOutput {
	const issues = Array.from({ length: issueCount }, (_, i) => createIssue({ message: `issue ${i}`, fixable: i < fixable }));
	return { issues, extracted_fields: fields, fallback };
}

function spec(overrides: Partial<SuccessSpec> & Pick<SuccessSpec, 'mode'>): SuccessSpec {
	return { exit_codes_ok: [0], ...overrides };
}

describe('evaluateSuccess', () => {
	describe('exit_code mode', () => {
		it('should pass on an allowed exit code', () => {
			expect(evaluateSuccess(0, parsed(0), spec({ mode: 'exit_code' }))).toEqual({ passed: true, score: 'Pass' });
		});

		it('should honour custom allowed codes', () => {
			expect(evaluateSuccess(5, parsed(0), spec({ mode: 'exit_code', exit_codes_ok: [0, 5] })).passed).toBe(true);
		});

		it('should fail with the exit code in the score', () => {
			expect(evaluateSuccess(1, parsed(0), spec({ mode: 'exit_code' }))).toEqual({ passed: false, score: 'Fail (exit=1)' });
		});

		it('should fail when there is no exit code', () => {
			expect(evaluateSuccess(null, parsed(0), spec({ mode: 'exit_code' }))).toEqual({ passed: false, score: 'Fail (exit=none)' });
		});
	});

	describe('json_field mode', () => {
		it('should pass a clean report', () => {
			expect(evaluateSuccess(0, parsed(0, { error_count: 0 }), spec({ mode: 'json_field', max_errors: 0 })))
				.toEqual({ passed: true, score: 'Pass' });
		});

		it('should prefer the extracted error_count over the issue count', () => {
			expect(evaluateSuccess(1, parsed(1, { error_count: 4 }), spec({ mode: 'json_field', max_errors: 0 })))
				.toEqual({ passed: false, score: '4 violations, 0 auto-fixable' });
		});

		it('should allow issues within max_errors when require_no_issues is not set', () => {
			expect(evaluateSuccess(1, parsed(2, {}, false, 1), spec({ mode: 'json_field', max_errors: 2 })))
				.toEqual({ passed: true, score: '2 violations, 1 auto-fixable' });
		});

		it('should require no issues by default when max_errors is unset', () => {
			expect(evaluateSuccess(0, parsed(1), spec({ mode: 'json_field' }))).toEqual({
				passed: false,
				score: '1 violations, 0 auto-fixable',
			});
		});

		it('should apply an explicit require_no_issues together with max_errors', () => {
			expect(evaluateSuccess(0, parsed(1), spec({ mode: 'json_field', max_errors: 5, require_no_issues: true })).passed).toBe(false);
		});

		it('should use exit-code semantics when parsing fell back', () => {
			expect(evaluateSuccess(2, parsed(0, { error_count: null }, true), spec({ mode: 'json_field', max_errors: 0 })))
				.toEqual({ passed: false, score: 'Fail (exit=2)' });
			expect(evaluateSuccess(0, parsed(0, { error_count: null }, true), spec({ mode: 'json_field', max_errors: 0 })))
				.toEqual({ passed: true, score: 'Pass' });
		});
	});

	describe('regex mode', () => {
		it('should fail when any line matched', () => {
			expect(evaluateSuccess(0, parsed(3, {}, false, 2), spec({ mode: 'regex' })))
				.toEqual({ passed: false, score: '3 violations, 2 auto-fixable' });
		});

		it('should use exit-code semantics when nothing matched', () => {
			expect(evaluateSuccess(0, parsed(0, {}, true), spec({ mode: 'regex' }))).toEqual({ passed: true, score: 'Pass' });
			expect(evaluateSuccess(3, parsed(0, {}, true), spec({ mode: 'regex' }))).toEqual({ passed: false, score: 'Fail (exit=3)' });
		});
	});
});
