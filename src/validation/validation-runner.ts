import { EventEmitter } from 'events';
import { Logger } from '../utils/logger.js';
import { filterByGlobs, hasExtension } from '../utils/files.js';
import type { GateDefinition } from '../parsers/index.js';
import type { ArtifactLogger } from '../artifact/artifact-logger.js';
import type { IGateResult, RunMode } from './types.js';
import { runGate, skippedResult } from './gate-runner.js';

export const SKIP_TESTS_IN_FILE_MODE = 'Skipped (file-specific mode - tests run project-wide)';
export const SKIP_STATIC_IN_PROJECT_MODE = 'Skipped (project-level mode - static analysis unavailable)';
export const SKIP_NO_MATCHING_FILES = 'Skipped (no matching files)';

export interface IValidationRunnerOptions {
	workspaceRoot: string;
	artifactLogger?: ArtifactLogger;
	env?: NodeJS.ProcessEnv;
}

export interface IValidationRunResult {
	mode: RunMode;
	results: IGateResult[];
}

export function runModeFor(files: string[]): RunMode {
	return files.length > 0 ? 'file-specific' : 'project-level';
}

/** Resolved files a static gate applies to: its file types, then its own scope globs. */
export function gateFiles(gate: GateDefinition, resolved: string[]): string[] {
	const typed = resolved.filter(f => hasExtension(f, gate.capabilities.file_types));
	if (!gate.scope) return typed;
	return filterByGlobs(typed, gate.scope.include_globs, gate.scope.exclude_globs);
}

function skipReason(gate: GateDefinition, mode: RunMode, files: string[]): string | undefined {
	if (gate.category === 'tests') {
		return mode === 'file-specific' ? SKIP_TESTS_IN_FILE_MODE : undefined;
	}
	if (mode === 'project-level') return SKIP_STATIC_IN_PROJECT_MODE;
	return files.length === 0 ? SKIP_NO_MATCHING_FILES : undefined;
}

/**
 * Runs the active gates in pipeline order against the resolved files.
 * Every gate gets a result; a failing gate never stops the ones after it.
 */
export class ValidationRunner extends EventEmitter {
	private logger: Logger;
	private options: IValidationRunnerOptions;

	constructor(options: IValidationRunnerOptions) {
		super();
		this.options = options;
		this.logger = new Logger('ValidationRunner');
	}

	async run(gates: GateDefinition[], resolvedFiles: string[]): Promise<IValidationRunResult> {
		const mode = runModeFor(resolvedFiles);
		const results: IGateResult[] = [];

		this.logger.info(`Running ${gates.length} gate(s) in ${mode} mode on ${resolvedFiles.length} file(s)`);

		for (const gate of gates) {
			const files = gate.category === 'tests' ? [] : gateFiles(gate, resolvedFiles);
			const reason = skipReason(gate, mode, files);

			if (reason !== undefined) {
				const skipped = skippedResult(gate, reason);
				results.push(skipped);
				this.logger.debug(`Gate ${gate.id}: ${reason}`);
				this.emit('gateSkipped', skipped);
				continue;
			}

			this.logger.info(`Running gate: ${gate.name}`);
			this.emit('gateStarted', gate);

			const result = await runGate(gate, files, {
				workspaceRoot: this.options.workspaceRoot,
				artifactLogger: this.options.artifactLogger,
				env: this.options.env,
			});
			results.push(result);

			if (result.status === 'passed') {
				this.logger.success(`Gate passed: ${gate.name} (${result.duration_ms}ms)`);
				this.emit('gatePassed', result);
			} else {
				this.logger.error(`Gate failed: ${gate.name} (${result.score}, ${result.duration_ms}ms)`);
				this.emit('gateFailed', result);
			}
		}

		const outcome: IValidationRunResult = { mode, results };
		this.emit('validationComplete', outcome);

		const failed = results.filter(r => r.status === 'failed').map(r => r.gate_id);
		if (failed.length === 0) {
			this.logger.success('All active gates passed');
		} else {
			this.logger.error(`Quality gates failed: ${failed.join(', ')}`);
		}

		return outcome;
	}
}
