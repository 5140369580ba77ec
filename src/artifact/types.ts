import type { GateStatus, ICommandEnvironment, IIssue } from '../validation/types.js';

/** Full diagnostics of one failed gate, as written to disk. */
export interface IArtifactRecord {
	gate_id: string;
	gate_name: string;
	command: string[];
	cwd: string | null;
	files: string[];
	status: GateStatus;
	score: string;
	exit_code: number | null;
	timed_out: boolean;
	duration_ms: number;
	issues: IIssue[];
	environment: ICommandEnvironment;
	/** Untruncated streams. */
	stdout: string;
	stderr: string;
}

export interface IArtifactLoggerOptions {
	enabled: boolean;
	outputDir: string;
	maxFiles: number;
}
