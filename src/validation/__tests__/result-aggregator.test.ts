import { describe, it, expect } from 'vitest';
import { aggregate, implicatedFiles, updateBaseline } from '../result-aggregator.js';
import { createIssue } from '../gate-parsers.js';
import type { IGateResult, IResolvedScope } from '../types.js';
import type { BaselineState, BaselineStore } from '../../storage/state-store.js';
import { BaselineLockError } from '../../utils/errors.js';
import { FakeGit, MemoryBaselineStore } from '../../__tests__/fixtures.js';

function result(overrides: Partial<IGateResult> & Pick<IGateResult, 'gate_id' | 'status'>): IGateResult {
	return {
		name: overrides.gate_id,
		score: 'Pass',
		issues: [],
		duration_ms: 10,
		hints: [],
		files: [],
		...overrides,
	};
}

const resolved: IResolvedScope = { scope: 'auto', files: ['a.py', 'b.py', 'c.py'], baseline_fallback: false };

describe('aggregate', () => {
	it('should count outcomes and violations of gates that ran', () => {
		const run = {
			mode: 'file-specific' as const,
			results: [
				result({ gate_id: 'lint', status: 'failed', issues: [createIssue({ message: 'x', fixable: true }), createIssue({ message: 'y' })] }),
				result({ gate_id: 'types', status: 'passed', duration_ms: 30 }),
				result({ gate_id: 'tests', status: 'skipped', duration_ms: 0 }),
			],
		};

		const summary = aggregate(resolved, run, 55);

		expect(summary.version).toBe('2.0');
		expect(summary.scope).toBe('auto');
		expect(summary.mode).toBe('file-specific');
		expect(summary.files).toEqual(['a.py', 'b.py', 'c.py']);
		expect(summary.overall_pass).toBe(false);
		expect(summary.summary).toEqual({ passed: 1, failed: 1, skipped: 1, total_violations: 2, auto_fixable: 1 });
		expect(summary.timings).toEqual({ lint: 10, types: 30, tests: 0, total: 55 });
	});

	it('should pass when nothing failed, even with skips', () => {
		const summary = aggregate(resolved, {
			mode: 'project-level',
			results: [result({ gate_id: 'lint', status: 'skipped' }), result({ gate_id: 'tests', status: 'passed' })],
		});

		expect(summary.overall_pass).toBe(true);
		expect(summary.timings.total).toBe(20);
	});
});

describe('implicatedFiles', () => {
	it('should use in-scope issue files of failing gates', () => {
		const results = [
			result({
				gate_id: 'lint',
				status: 'failed',
				files: ['a.py', 'b.py'],
				issues: [createIssue({ message: 'x', file: 'b.py' }), createIssue({ message: 'y', file: 'outside.py' })],
			}),
			result({ gate_id: 'types', status: 'passed', files: ['c.py'] }),
		];

		expect(implicatedFiles(resolved, results)).toEqual(['b.py']);
	});

	it('should implicate every file a failing gate ran on when no issue names one', () => {
		const results = [
			result({ gate_id: 'format', status: 'failed', files: ['c.py', 'a.py'], issues: [createIssue({ message: 'Gate failed with exit code 1' })] }),
		];

		expect(implicatedFiles(resolved, results)).toEqual(['a.py', 'c.py']);
	});
});

describe('updateBaseline', () => {
	const previous: BaselineState = { baseline_sha: 'old', failed_files: ['b.py'] };

	function summaryOf(results: IGateResult[], scope: IResolvedScope = resolved) {
		return aggregate(scope, { mode: 'file-specific', results });
	}

	it('should advance to HEAD and clear failures when every gate passed', async () => {
		const store = new MemoryBaselineStore(previous);
		const git = new FakeGit();
		git.sha = 'new-head';

		const outcome = await updateBaseline({
			store, git, resolved, previous,
			summary: summaryOf([result({ gate_id: 'lint', status: 'passed' })]),
		});

		expect(outcome).toEqual({ updated: true, baseline_sha: 'new-head', failed_files: [] });
		expect(store.state).toEqual({ baseline_sha: 'new-head', failed_files: [] });
	});

	it('should keep the sha and narrow failed files on failure', async () => {
		const store = new MemoryBaselineStore(previous);

		const outcome = await updateBaseline({
			store, git: new FakeGit(), resolved, previous,
			summary: summaryOf([
				result({ gate_id: 'lint', status: 'failed', files: ['a.py'], issues: [createIssue({ message: 'x', file: 'a.py' })] }),
			]),
		});

		expect(outcome).toEqual({ updated: true, baseline_sha: 'old', failed_files: ['a.py'] });
	});

	it('should leave the sha unset after a fallback run fails', async () => {
		const store = new MemoryBaselineStore({ baseline_sha: 'gone', failed_files: [] });
		const fallback: IResolvedScope = { ...resolved, baseline_fallback: true };

		await updateBaseline({
			store, git: new FakeGit(), resolved: fallback, previous: store.state,
			summary: summaryOf([result({ gate_id: 'lint', status: 'failed', files: ['c.py'] })], fallback),
		});

		expect(store.state).toEqual({ baseline_sha: '', failed_files: ['c.py'] });
	});

	it('should not touch the baseline outside auto scope', async () => {
		const store = new MemoryBaselineStore(previous);
		const filesScope: IResolvedScope = { scope: 'files', files: ['a.py'], baseline_fallback: false };

		const outcome = await updateBaseline({
			store, git: new FakeGit(), resolved: filesScope, previous,
			summary: summaryOf([result({ gate_id: 'lint', status: 'passed' })], filesScope),
		});

		expect(outcome).toBeUndefined();
		expect(store.saved).toEqual([]);
	});

	it('should report a held lock without failing', async () => {
		const locked: BaselineStore = {
			load: async () => previous,
			save: async () => {
				throw new BaselineLockError('/ws/.qgate/state.json.lock', 'other run');
			},
		};

		const outcome = await updateBaseline({
			store: locked, git: new FakeGit(), resolved, previous,
			summary: summaryOf([result({ gate_id: 'lint', status: 'passed' })]),
		});

		expect(outcome).toEqual({
			updated: false,
			baseline_sha: 'old',
			failed_files: ['b.py'],
			error: 'Baseline state is locked by another run (other run): /ws/.qgate/state.json.lock',
		});
	});

	it('should report a failing store without failing the run', async () => {
		const broken: BaselineStore = {
			load: async () => previous,
			save: async () => {
				throw new Error('ENOSPC: no space left on device');
			},
		};

		const outcome = await updateBaseline({
			store: broken, git: new FakeGit(), resolved, previous,
			summary: summaryOf([result({ gate_id: 'lint', status: 'passed' })]),
		});

		expect(outcome).toEqual({
			updated: false,
			baseline_sha: 'old',
			failed_files: ['b.py'],
			error: 'ENOSPC: no space left on device',
		});
	});

	it('should reject the second of two updates made from the same load', async () => {
		const store = new MemoryBaselineStore({ baseline_sha: 'old', failed_files: ['a.py'] });
		const git = new FakeGit();
		git.sha = 'new';
		const first = await store.load();
		const second = await store.load();

		const advanced = await updateBaseline({
			store, git, resolved, previous: first,
			summary: summaryOf([result({ gate_id: 'lint', status: 'passed' })]),
		});
		const stale = await updateBaseline({
			store, git, resolved, previous: second,
			summary: summaryOf([result({ gate_id: 'lint', status: 'failed', files: ['c.py'] })]),
		});

		expect(advanced).toEqual({ updated: true, baseline_sha: 'new', failed_files: [] });
		expect(stale?.updated).toBe(false);
		expect(stale?.error).toBe('Baseline state was updated by another run since it was loaded: memory');
		expect(store.state).toEqual({ baseline_sha: 'new', failed_files: [] });
	});
});
