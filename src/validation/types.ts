export type ScopeMode = 'auto' | 'branch' | 'project' | 'files';
export type RunMode = 'file-specific' | 'project-level';
export type GateStatus = 'passed' | 'failed' | 'skipped';

/** One normalized diagnostic. Absent values are null. */
export interface IIssue {
	readonly code: string | null;
	readonly message: string;
	readonly line: number | null;
	readonly column: number | null;
	readonly file: string | null;
	readonly fixable: boolean;
	readonly severity?: string;
}

/** Where a failed gate's tool came from, for reproducing the failure. */
export interface ICommandEnvironment {
	/** Resolved executable, or null when it is not on PATH. */
	tool_path: string | null;
	platform: string;
	node_version: string;
	/** First line of `<tool> --version`, when the tool answers. */
	tool_version?: string;
}

export interface ICommandSnapshot {
	executable: string;
	args: string[];
	cwd: string | null;
	exit_code: number | null;
	/** Recorded for failed gates only. */
	environment?: ICommandEnvironment;
}

export interface IGateOutput {
	stdout: string;
	stderr: string;
	truncated: boolean;
	full_log_path?: string;
}

export interface IGateResult {
	gate_id: string;
	name: string;
	status: GateStatus;
	skip_reason?: string;
	score: string;
	issues: IIssue[];
	duration_ms: number;
	command_snapshot?: ICommandSnapshot;
	output?: IGateOutput;
	hints: string[];
	artifact_path?: string;
	/** Values extracted by json_field pointers. */
	fields?: Record<string, unknown>;
	/** Files the gate was run against (empty for tests gates). */
	files: string[];
}

export interface IRunCounts {
	passed: number;
	failed: number;
	skipped: number;
	total_violations: number;
	auto_fixable: number;
}

export interface IBaselineOutcome {
	updated: boolean;
	baseline_sha: string;
	failed_files: string[];
	error?: string;
}

export interface IRunSummary {
	version: string;
	scope: ScopeMode;
	mode: RunMode;
	files: string[];
	gates: IGateResult[];
	overall_pass: boolean;
	timings: Record<string, number>;
	summary: IRunCounts;
	baseline?: IBaselineOutcome;
}

export interface IResolvedScope {
	scope: ScopeMode;
	files: string[];
	/** True when auto scope had no usable baseline and resolved as project scope. */
	baseline_fallback: boolean;
}
