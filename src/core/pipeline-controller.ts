import { EventEmitter } from 'events';
import { resolve } from 'path';
import { z } from 'zod';
import { loadPipeline, type Pipeline } from '../parsers/index.js';
import { ArtifactLogger } from '../artifact/artifact-logger.js';
import { ValidationRunner } from '../validation/validation-runner.js';
import { aggregate, updateBaseline } from '../validation/result-aggregator.js';
import type { IRunSummary } from '../validation/types.js';
import { EMPTY_BASELINE, type BaselineState, type BaselineStore } from '../storage/state-store.js';
import type { PhaseStateProvider } from '../storage/phase-state.js';
import type { GitClient } from '../utils/git.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { ScopeResolver } from './scope-resolver.js';

const RunInputSchema = z.object({
	scope: z.enum(['auto', 'branch', 'project', 'files']).default('auto'),
	files: z.array(z.string().min(1)).optional(),
}).strict().superRefine((input, ctx) => {
	const count = input.files?.length ?? 0;
	if (input.scope === 'files' && count === 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['files'], message: 'scope "files" requires a non-empty files list' });
	}
	if (input.scope !== 'files' && count > 0) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['files'], message: `files must be empty for scope "${input.scope}"` });
	}
});

export type RunInput = z.input<typeof RunInputSchema>;

export interface IQualityGatePipelineOptions {
	workspaceRoot: string;
	/** Absolute, or relative to workspaceRoot. */
	pipelineFile: string;
	baselineStore: BaselineStore;
	git: GitClient;
	phaseState?: PhaseStateProvider;
	env?: NodeJS.ProcessEnv;
}

/**
 * One quality gate run: validate input, load the pipeline, resolve the scope,
 * execute the gates, aggregate, and record the baseline for auto runs.
 * Input and configuration errors are raised before any gate runs.
 */
export class QualityGatePipeline extends EventEmitter {
	private logger: Logger;
	private options: IQualityGatePipelineOptions;

	constructor(options: IQualityGatePipelineOptions) {
		super();
		this.options = options;
		this.logger = new Logger('Pipeline');
	}

	async run(input: unknown = {}): Promise<IRunSummary> {
		const started = Date.now();
		const parsed = RunInputSchema.safeParse(input);
		if (!parsed.success) {
			throw new ValidationError(`Invalid run input: ${parsed.error.issues.map(i => i.message).join('; ')}`);
		}
		const { scope, files } = parsed.data;
		const { workspaceRoot, baselineStore, git } = this.options;

		const pipeline = this.loadPipeline();

		const previous: BaselineState = scope === 'auto' ? await this.loadBaseline() : EMPTY_BASELINE;

		const resolver = new ScopeResolver({ workspaceRoot, pipeline, git, phaseState: this.options.phaseState });
		const resolved = await resolver.resolve(scope, files, previous);
		this.emit('scopeResolved', resolved);
		this.logger.debug(`Scope ${resolved.scope}: ${resolved.files.length} file(s)${resolved.baseline_fallback ? ' (baseline fallback)' : ''}`);

		const runner = new ValidationRunner({
			workspaceRoot,
			artifactLogger: new ArtifactLogger({
				enabled: pipeline.artifact_logging.enabled,
				outputDir: resolve(workspaceRoot, pipeline.artifact_logging.output_dir),
				maxFiles: pipeline.artifact_logging.max_files,
			}),
			env: this.options.env,
		});
		for (const event of ['gateStarted', 'gatePassed', 'gateFailed', 'gateSkipped']) {
			runner.on(event, (payload: unknown) => this.emit(event, payload));
		}

		const run = await runner.run(pipeline.active, resolved.files);
		const summary = aggregate(resolved, run, Date.now() - started);

		const baseline = await updateBaseline({ store: baselineStore, git, resolved, summary, previous });
		if (baseline !== undefined) summary.baseline = baseline;

		this.emit('runComplete', summary);
		return summary;
	}

	private async loadBaseline(): Promise<BaselineState> {
		try {
			return await this.options.baselineStore.load();
		} catch (error) {
			this.logger.warn(`Cannot read baseline state (${errorMessage(error)}), running without a baseline`);
			return EMPTY_BASELINE;
		}
	}

	private loadPipeline(): Pipeline {
		const path = resolve(this.options.workspaceRoot, this.options.pipelineFile);
		this.logger.debug(`Loading quality gates from ${path}`);
		return loadPipeline(path);
	}
}
