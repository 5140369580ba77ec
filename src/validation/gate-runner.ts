import { resolve } from 'path';
import { FILES_PLACEHOLDER, type GateDefinition } from '../parsers/index.js';
import type { ArtifactLogger } from '../artifact/artifact-logger.js';
import { execFileNoThrow, findExecutable, type IShellResult } from '../utils/shell.js';
import { ExecutionError } from '../utils/errors.js';
import { toWorkspacePath } from '../utils/files.js';
import { Logger } from '../utils/logger.js';
import { createIssue, failureIssue, parseGateOutput, type IParsedOutput } from './gate-parsers.js';
import { NOT_FOUND_SCORE, TIMEOUT_SCORE, evaluateSuccess } from './success-evaluator.js';
import { captureOutput } from './output-capture.js';
import type { GateStatus, ICommandEnvironment, ICommandSnapshot, IGateResult, IIssue } from './types.js';

export { FILES_PLACEHOLDER };

export interface IGateRunOptions {
	workspaceRoot: string;
	artifactLogger?: ArtifactLogger;
	env?: NodeJS.ProcessEnv;
}

const logger = new Logger('GateRunner');

const VERSION_TIMEOUT_MS = 5000;

/**
 * Expands the `{files}` placeholder into zero or more arguments. Without a
 * placeholder the files are appended when `append` is set, otherwise dropped.
 */
export function buildCommand(template: string[], files: string[], append: boolean): string[] {
	if (template.includes(FILES_PLACEHOLDER)) {
		return template.flatMap(arg => (arg === FILES_PLACEHOLDER ? files : [arg]));
	}
	return append ? [...template, ...files] : [...template];
}

/** Shell-like rendering of an argv list, used for hints. */
export function formatCommand(argv: string[]): string {
	return argv.map(arg => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`)).join(' ');
}

function withWorkspacePaths(issues: IIssue[], workspaceRoot: string, cwd: string): IIssue[] {
	return issues.map(issue =>
		issue.file === null ? issue : createIssue({ ...issue, file: toWorkspacePath(issue.file, workspaceRoot, cwd) }),
	);
}

/** Tool location and versions for a failed gate. The version query is best-effort. */
export async function collectEnvironment(executable: string, cwd: string, env?: NodeJS.ProcessEnv): Promise<ICommandEnvironment> {
	const environment: ICommandEnvironment = {
		tool_path: await findExecutable(executable, { cwd, env }),
		platform: `${process.platform}-${process.arch}`,
		node_version: process.version,
	};
	if (environment.tool_path === null) return environment;

	const version = await execFileNoThrow(executable, ['--version'], { cwd, env, timeout: VERSION_TIMEOUT_MS });
	const firstLine = (version.stdout.trim() || version.stderr.trim()).split('\n')[0];
	if (!version.timedOut && version.spawnError === undefined && firstLine) {
		environment.tool_version = firstLine.trim();
	}
	return environment;
}

interface IOutcome {
	passed: boolean;
	score: string;
	issues: IIssue[];
	fields?: Record<string, unknown>;
}

function judge(gate: GateDefinition, shell: IShellResult, argv: string[]): IOutcome {
	if (shell.timedOut) {
		return { passed: false, score: TIMEOUT_SCORE, issues: [failureIssue(`${gate.name} timed out after ${gate.execution.timeout_seconds}s`)] };
	}

	if (shell.spawnError !== undefined) {
		const error = new ExecutionError(`Tool not found: ${argv[0]} (${shell.spawnError})`, formatCommand(argv), shell.spawnError);
		logger.warn(`${gate.id}: ${error.message}`);
		return { passed: false, score: NOT_FOUND_SCORE, issues: [failureIssue(error.message)] };
	}

	const parsed: IParsedOutput = parseGateOutput(
		{ stdout: shell.stdout, stderr: shell.stderr, exit_code: shell.exitCode },
		gate,
	);
	const verdict = evaluateSuccess(shell.exitCode, parsed, gate.success);
	const issues = !verdict.passed && parsed.issues.length === 0
		? [failureIssue(`Gate failed with exit code ${shell.exitCode ?? 'none'}`)]
		: parsed.issues;

	return {
		passed: verdict.passed,
		score: verdict.score,
		issues,
		...(gate.parsing.strategy === 'json_field' ? { fields: parsed.extracted_fields } : {}),
	};
}

/**
 * Runs one gate against its file set and produces its frozen result. Never
 * throws for tool problems: timeouts and missing tools fail the gate only.
 */
export async function runGate(gate: GateDefinition, files: string[], options: IGateRunOptions): Promise<IGateResult> {
	const argv = buildCommand(gate.execution.command, files, gate.category === 'static');
	const [executable, ...args] = argv;
	const cwd = resolve(options.workspaceRoot, gate.execution.working_dir ?? '.');

	logger.debug(`${gate.id}: ${formatCommand(argv)} (cwd ${cwd})`);
	const shell = await execFileNoThrow(executable, args, {
		cwd,
		timeout: gate.execution.timeout_seconds * 1000,
		env: options.env,
	});

	const outcome = judge(gate, shell, argv);
	const issues = withWorkspacePaths(outcome.issues, options.workspaceRoot, cwd);
	const status: GateStatus = outcome.passed ? 'passed' : 'failed';

	const snapshot: ICommandSnapshot = {
		executable,
		args,
		cwd: gate.execution.working_dir ?? null,
		exit_code: shell.exitCode,
	};
	const result: IGateResult = {
		gate_id: gate.id,
		name: gate.name,
		status,
		score: outcome.score,
		issues,
		duration_ms: shell.durationMs,
		command_snapshot: snapshot,
		hints: [],
		files,
		...(outcome.fields !== undefined ? { fields: outcome.fields } : {}),
	};

	if (!outcome.passed) {
		const environment = await collectEnvironment(executable, cwd, options.env);
		const output = captureOutput(shell.stdout, shell.stderr);
		snapshot.environment = environment;
		const artifactPath = await options.artifactLogger?.persist({
			gate_id: gate.id,
			gate_name: gate.name,
			command: argv,
			cwd: gate.execution.working_dir ?? null,
			files,
			status,
			score: outcome.score,
			exit_code: shell.exitCode,
			timed_out: shell.timedOut,
			duration_ms: shell.durationMs,
			issues,
			environment,
			stdout: shell.stdout,
			stderr: shell.stderr,
		});

		result.output = output.truncated && artifactPath !== undefined ? { ...output, full_log_path: artifactPath } : output;
		result.hints = [`Re-run: ${formatCommand(argv)}`, ...gate.hints];
		if (artifactPath !== undefined) result.artifact_path = artifactPath;
	}

	Object.freeze(snapshot);
	Object.freeze(result.issues);
	Object.freeze(result.hints);
	return Object.freeze(result);
}

/** Result for a gate that did not run in this mode. */
export function skippedResult(gate: GateDefinition, reason: string): IGateResult {
	const result: IGateResult = {
		gate_id: gate.id,
		name: gate.name,
		status: 'skipped',
		skip_reason: reason,
		score: 'Skipped',
		issues: [],
		duration_ms: 0,
		hints: [],
		files: [],
	};
	return Object.freeze(result);
}
