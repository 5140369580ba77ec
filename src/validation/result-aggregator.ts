import type { BaselineState, BaselineStore } from '../storage/state-store.js';
import type { GitClient } from '../utils/git.js';
import { errorMessage } from '../utils/errors.js';
import { uniqueSorted } from '../utils/files.js';
import { Logger } from '../utils/logger.js';
import type { IBaselineOutcome, IGateResult, IResolvedScope, IRunCounts, IRunSummary } from './types.js';
import type { IValidationRunResult } from './validation-runner.js';

export const SUMMARY_VERSION = '2.0';

const logger = new Logger('Aggregator');

function countResults(results: IGateResult[]): IRunCounts {
	const ran = results.filter(r => r.status !== 'skipped');
	return {
		passed: results.filter(r => r.status === 'passed').length,
		failed: results.filter(r => r.status === 'failed').length,
		skipped: results.filter(r => r.status === 'skipped').length,
		total_violations: ran.reduce((sum, r) => sum + r.issues.length, 0),
		auto_fixable: ran.reduce((sum, r) => sum + r.issues.filter(i => i.fixable).length, 0),
	};
}

export function aggregate(resolved: IResolvedScope, run: IValidationRunResult, totalMs?: number): IRunSummary {
	const timings: Record<string, number> = {};
	for (const result of run.results) timings[result.gate_id] = result.duration_ms;
	timings.total = totalMs ?? run.results.reduce((sum, r) => sum + r.duration_ms, 0);

	return {
		version: SUMMARY_VERSION,
		scope: resolved.scope,
		mode: run.mode,
		files: [...resolved.files],
		gates: run.results,
		overall_pass: run.results.every(r => r.status !== 'failed'),
		timings,
		summary: countResults(run.results),
	};
}

/**
 * Files a failing run should re-check next time. Issue files outside the
 * resolved scope are ignored; a failing gate with no in-scope issue file
 * implicates every file it ran on.
 */
export function implicatedFiles(resolved: IResolvedScope, results: IGateResult[]): string[] {
	const inScope = new Set(resolved.files);
	const implicated: string[] = [];

	for (const result of results.filter(r => r.status === 'failed')) {
		const issueFiles = result.issues
			.map(i => i.file)
			.filter((f): f is string => f !== null && inScope.has(f));
		implicated.push(...(issueFiles.length > 0 ? issueFiles : result.files.filter(f => inScope.has(f))));
	}

	return uniqueSorted(implicated);
}

export interface IBaselineUpdateOptions {
	store: BaselineStore;
	git: GitClient;
	resolved: IResolvedScope;
	summary: IRunSummary;
	previous: BaselineState;
}

/**
 * Advances or narrows the baseline after an auto-scope run. Other scopes leave
 * it untouched and return undefined. The write only lands if the stored state
 * still equals `previous`. A held lock, a conflicting writer or any other store
 * or git failure leaves the baseline as it was without failing the run.
 */
export async function updateBaseline(options: IBaselineUpdateOptions): Promise<IBaselineOutcome | undefined> {
	const { store, git, resolved, summary, previous } = options;
	if (resolved.scope !== 'auto') return undefined;

	let next: BaselineState;
	try {
		next = summary.overall_pass
			? { baseline_sha: await git.headSha(), failed_files: [] }
			: {
				baseline_sha: resolved.baseline_fallback ? '' : previous.baseline_sha,
				failed_files: implicatedFiles(resolved, summary.gates),
			};
		await store.save(next, previous);
	} catch (error) {
		const message = errorMessage(error);
		logger.warn(`Baseline not updated: ${message}`);
		return {
			updated: false,
			baseline_sha: previous.baseline_sha,
			failed_files: [...previous.failed_files],
			error: message,
		};
	}

	logger.debug(`Baseline updated: sha=${next.baseline_sha || '-'}, ${next.failed_files.length} failed file(s)`);
	return { updated: true, baseline_sha: next.baseline_sha, failed_files: [...next.failed_files] };
}
