export {
	ValidationRunner,
	gateFiles,
	runModeFor,
	SKIP_NO_MATCHING_FILES,
	SKIP_STATIC_IN_PROJECT_MODE,
	SKIP_TESTS_IN_FILE_MODE,
} from './validation-runner.js';
export type { IValidationRunnerOptions, IValidationRunResult } from './validation-runner.js';
export { runGate, buildCommand, collectEnvironment, formatCommand, skippedResult } from './gate-runner.js';
export type { IGateRunOptions } from './gate-runner.js';
export { parseGateOutput } from './gate-parsers.js';
export type { IParsedOutput, IRawOutput } from './gate-parsers.js';
export { evaluateSuccess } from './success-evaluator.js';
export { captureOutput } from './output-capture.js';
export { aggregate, implicatedFiles, updateBaseline } from './result-aggregator.js';
export { formatSummaryLine, buildCompactResult, renderTextReport } from './report.js';
export type { ICompactResult, ICompactGate } from './report.js';
export type {
	ScopeMode,
	RunMode,
	GateStatus,
	IIssue,
	IGateResult,
	ICommandSnapshot,
	ICommandEnvironment,
	IRunSummary,
	IRunCounts,
	IBaselineOutcome,
	IResolvedScope,
} from './types.js';
