import type { IGateResult, IRunSummary } from './types.js';

export interface ICompactGate {
	id: string;
	passed: boolean;
	skipped: boolean;
	violations?: number;
}

export interface ICompactResult {
	gates: ICompactGate[];
}

/** One-line status used as the headline of every report. */
export function formatSummaryLine(summary: IRunSummary): string {
	const { passed, failed, skipped, total_violations } = summary.summary;

	if (failed > 0) {
		const names = summary.gates.filter(g => g.status === 'failed').map(g => g.name);
		return `❌ Quality gates: ${passed}/${passed + failed} passed — ${total_violations} violations in ${names.join(', ')}`;
	}
	if (skipped > 0) {
		return `⚠️ Quality gates: ${passed}/${passed} active (${skipped} skipped)`;
	}
	return `✅ Quality gates: ${passed}/${passed} passed (${total_violations} violations)`;
}

/** Gate outcomes without output, hints or timings. */
export function buildCompactResult(summary: IRunSummary): ICompactResult {
	return {
		gates: summary.gates.map(gate => ({
			id: gate.gate_id,
			passed: gate.status === 'passed',
			skipped: gate.status === 'skipped',
			...(gate.status === 'failed' ? { violations: gate.issues.length } : {}),
		})),
	};
}

function location(file: string | null, line: number | null, column: number | null): string {
	if (file === null) return '';
	const parts = [file, line, line !== null ? column : null].filter(p => p !== null);
	return `${parts.join(':')} `;
}

function renderGate(gate: IGateResult): string[] {
	const marker = gate.status === 'passed' ? '✓' : gate.status === 'failed' ? '✗' : '-';
	const lines = [`${marker} ${gate.name} [${gate.gate_id}]: ${gate.skip_reason ?? gate.score}`];

	if (gate.status !== 'failed') return lines;

	for (const issue of gate.issues) {
		const code = issue.code !== null ? `${issue.code} ` : '';
		lines.push(`    ${location(issue.file, issue.line, issue.column)}${code}${issue.message}`);
	}
	for (const hint of gate.hints) lines.push(`    hint: ${hint}`);
	if (gate.artifact_path !== undefined) lines.push(`    log: ${gate.artifact_path}`);
	return lines;
}

/** Human-readable report printed by the CLI. */
export function renderTextReport(summary: IRunSummary): string {
	const lines = [
		formatSummaryLine(summary),
		`Scope: ${summary.scope} (${summary.mode}, ${summary.files.length} file(s))`,
		'',
		...summary.gates.flatMap(renderGate),
	];

	if (summary.baseline !== undefined) {
		lines.push('');
		lines.push(summary.baseline.updated
			? `Baseline: ${summary.baseline.baseline_sha || '(unset)'}, ${summary.baseline.failed_files.length} failed file(s)`
			: `Baseline not updated: ${summary.baseline.error ?? 'unknown reason'}`);
	}

	lines.push('', `Total: ${summary.timings.total ?? 0}ms`);
	return lines.join('\n');
}
