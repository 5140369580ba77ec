import { describe, it, expect } from 'vitest';
import { buildCompactResult, formatSummaryLine, renderTextReport } from '../report.js';
import { aggregate } from '../result-aggregator.js';
import { createIssue } from '../gate-parsers.js';
import type { IGateResult, IRunSummary } from '../types.js';

function gate(id: string, name: string, status: IGateResult['status'], extra: Partial<IGateResult> = {}): IGateResult {
	return { gate_id: id, name, status, score: 'Pass', issues: [], duration_ms: 5, hints: [], files: [], ...extra };
}

function summarize(results: IGateResult[]): IRunSummary {
	return aggregate({ scope: 'files', files: ['a.py'], baseline_fallback: false }, { mode: 'file-specific', results }, 42);
}

const lintFailure = gate('lint', 'Ruff Lint', 'failed', {
	score: '2 violations, 1 auto-fixable',
	issues: [
		createIssue({ code: 'F401', message: 'unused import', file: 'a.py', line: 1, column: 8, fixable: true }),
		createIssue({ code: 'E501', message: 'line too long', file: 'a.py', line: 3 }),
	],
	hints: ['Re-run: ruff check a.py'],
	artifact_path: 'temp/qa_logs/x.json',
});

describe('formatSummaryLine', () => {
	it('should report a clean pass', () => {
		const summary = summarize([gate('format', 'Format', 'passed'), gate('lint', 'Lint', 'passed')]);
		expect(formatSummaryLine(summary)).toBe('✅ Quality gates: 2/2 passed (0 violations)');
	});

	it('should name failing gates', () => {
		const summary = summarize([
			gate('format', 'Format', 'passed'),
			lintFailure,
			gate('types', 'Pyright', 'failed', { issues: [createIssue({ message: 'bad' })] }),
		]);
		expect(formatSummaryLine(summary)).toBe('❌ Quality gates: 1/3 passed — 3 violations in Ruff Lint, Pyright');
	});

	it('should warn about skips when nothing failed', () => {
		const summary = summarize([gate('lint', 'Lint', 'passed'), gate('tests', 'Tests', 'skipped')]);
		expect(formatSummaryLine(summary)).toBe('⚠️ Quality gates: 1/1 active (1 skipped)');
	});

	it('should prefer the failure line over the skip line', () => {
		const summary = summarize([lintFailure, gate('tests', 'Tests', 'skipped')]);
		expect(formatSummaryLine(summary)).toBe('❌ Quality gates: 0/1 passed — 2 violations in Ruff Lint');
	});
});

describe('buildCompactResult', () => {
	it('should list outcomes with violations for failed gates only', () => {
		const summary = summarize([gate('format', 'Format', 'passed'), lintFailure, gate('tests', 'Tests', 'skipped')]);

		expect(buildCompactResult(summary)).toEqual({
			gates: [
				{ id: 'format', passed: true, skipped: false },
				{ id: 'lint', passed: false, skipped: false, violations: 2 },
				{ id: 'tests', passed: false, skipped: true },
			],
		});
	});
});

describe('renderTextReport', () => {
	it('should render issues, hints and the artifact path of failed gates', () => {
		const summary = summarize([lintFailure, gate('tests', 'Tests', 'skipped', { skip_reason: 'Skipped (file-specific mode - tests run project-wide)' })]);

		expect(renderTextReport(summary).split('\n')).toEqual([
			'❌ Quality gates: 0/1 passed — 2 violations in Ruff Lint',
			'Scope: files (file-specific, 1 file(s))',
			'',
			'✗ Ruff Lint [lint]: 2 violations, 1 auto-fixable',
			'    a.py:1:8 F401 unused import',
			'    a.py:3 E501 line too long',
			'    hint: Re-run: ruff check a.py',
			'    log: temp/qa_logs/x.json',
			'- Tests [tests]: Skipped (file-specific mode - tests run project-wide)',
			'',
			'Total: 42ms',
		]);
	});

	it('should describe a rejected baseline update', () => {
		const summary = summarize([gate('lint', 'Lint', 'passed')]);
		summary.baseline = { updated: false, baseline_sha: 'abc', failed_files: [], error: 'locked' };

		expect(renderTextReport(summary)).toContain('Baseline not updated: locked');
	});
});
