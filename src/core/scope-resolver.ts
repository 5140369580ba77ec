import { join, resolve } from 'path';
import type { Pipeline } from '../parsers/index.js';
import type { BaselineState } from '../storage/state-store.js';
import type { PhaseStateProvider } from '../storage/phase-state.js';
import type { GitClient } from '../utils/git.js';
import type { IResolvedScope, ScopeMode } from '../validation/types.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import {
	exists,
	filterByGlobs,
	hasExtension,
	isDirectory,
	toWorkspacePath,
	uniqueSorted,
	walkFiles,
} from '../utils/files.js';

export const DEFAULT_PARENT_BRANCH = 'main';

export interface IScopeResolverOptions {
	workspaceRoot: string;
	pipeline: Pipeline;
	git: GitClient;
	phaseState?: PhaseStateProvider;
}

/**
 * Computes the files a run targets. Results are workspace-relative POSIX
 * paths, sorted and de-duplicated; an empty list is a valid result.
 */
export class ScopeResolver {
	private logger: Logger;
	private options: IScopeResolverOptions;
	private extensions: Set<string>;

	constructor(options: IScopeResolverOptions) {
		this.options = options;
		this.logger = new Logger('ScopeResolver');
		this.extensions = new Set(options.pipeline.active.flatMap(g => g.capabilities.file_types));
	}

	async resolve(scope: ScopeMode, explicitFiles: string[] | undefined, baseline: BaselineState): Promise<IResolvedScope> {
		switch (scope) {
			case 'files':
				return { scope, files: await this.resolveExplicit(explicitFiles ?? []), baseline_fallback: false };
			case 'branch':
				return { scope, files: await this.resolveBranch(), baseline_fallback: false };
			case 'project':
				return { scope, files: await this.resolveProject(), baseline_fallback: false };
			case 'auto':
				return this.resolveAuto(baseline);
			default: {
				const unreachable: never = scope;
				throw new ValidationError(`Unknown scope: ${String(unreachable)}`);
			}
		}
	}

	private async resolveExplicit(files: string[]): Promise<string[]> {
		if (files.length === 0) {
			throw new ValidationError('scope "files" requires a non-empty files list');
		}

		const { workspaceRoot } = this.options;
		const resolved: string[] = [];
		const missing: string[] = [];

		for (const file of files) {
			const target = resolve(workspaceRoot, file);
			const relativePath = toWorkspacePath(file, workspaceRoot);

			if (await isDirectory(target)) {
				const contained = await walkFiles(workspaceRoot, target);
				resolved.push(...contained.filter(f => hasExtension(f, this.extensions)));
			} else if (await exists(target)) {
				resolved.push(relativePath);
			} else {
				missing.push(file);
			}
		}

		if (missing.length > 0) {
			throw new ValidationError(`File not found: ${missing.join(', ')}`);
		}
		return uniqueSorted(resolved);
	}

	/** Files changed since the parent branch. Git failures resolve to an empty scope. */
	private async resolveBranch(): Promise<string[]> {
		const { git, phaseState } = this.options;
		let parent: string = DEFAULT_PARENT_BRANCH;
		let changed: string[];
		try {
			const current = await git.currentBranch();
			parent = (await phaseState?.parentBranch(current)) ?? DEFAULT_PARENT_BRANCH;
			this.logger.debug(`Branch scope: ${parent}..HEAD (current branch ${current})`);
			changed = await git.diff(parent, 'HEAD');
		} catch (error) {
			this.logger.warn(`Cannot resolve branch scope against ${parent} (${errorMessage(error)}), no files selected`);
			return [];
		}
		return this.keepRelevant(changed);
	}

	private async resolveProject(): Promise<string[]> {
		const { workspaceRoot, pipeline } = this.options;
		const { include_globs, exclude_globs } = pipeline.project_scope;
		if (include_globs.length === 0) return [];

		const all = await walkFiles(workspaceRoot);
		return filterByGlobs(all, include_globs, exclude_globs);
	}

	private async resolveAuto(baseline: BaselineState): Promise<IResolvedScope> {
		if (!baseline.baseline_sha) {
			this.logger.info('No quality baseline recorded yet, using project scope');
			return { scope: 'auto', files: await this.resolveProject(), baseline_fallback: true };
		}

		let changed: string[];
		try {
			changed = await this.options.git.diff(baseline.baseline_sha, 'HEAD');
		} catch (error) {
			this.logger.warn(`Baseline ${baseline.baseline_sha} is unusable (${errorMessage(error)}), using project scope`);
			return { scope: 'auto', files: await this.resolveProject(), baseline_fallback: true };
		}

		const files = await this.keepRelevant([...changed, ...baseline.failed_files]);
		return { scope: 'auto', files, baseline_fallback: false };
	}

	/** Drops paths with no gate-relevant extension and paths that no longer exist. */
	private async keepRelevant(paths: string[]): Promise<string[]> {
		const { workspaceRoot } = this.options;
		const kept: string[] = [];
		for (const path of uniqueSorted(paths)) {
			if (!hasExtension(path, this.extensions)) continue;
			if (await exists(join(workspaceRoot, path))) {
				kept.push(path);
			} else {
				this.logger.debug(`Dropping vanished path ${path}`);
			}
		}
		return kept;
	}
}
