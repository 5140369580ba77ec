import { execFile as _execFile } from 'child_process';
import { access, constants } from 'fs/promises';
import { delimiter, isAbsolute, join, resolve } from 'path';
import { promisify } from 'util';

const execFileAsync = promisify(_execFile);

const MAX_BUFFER_CODE = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

export interface IShellResult {
	stdout: string;
	stderr: string;
	/** Null when the process produced no exit status (timed out, killed, never started). */
	exitCode: number | null;
	durationMs: number;
	timedOut: boolean;
	/** errno code (e.g. ENOENT) when the process could not be started. */
	spawnError?: string;
}

export interface IShellOptions {
	cwd?: string;
	/** Milliseconds before the child is killed with SIGKILL. */
	timeout?: number;
	env?: NodeJS.ProcessEnv;
}

interface IExecFailure extends Error {
	code?: string | number | null;
	killed?: boolean;
	signal?: string | null;
	stdout?: string;
	stderr?: string;
}

function isExecFailure(error: unknown): error is IExecFailure {
	return error instanceof Error && ('code' in error || 'killed' in error);
}

/**
 * Executes a command using execFile (not exec) for shell injection safety.
 * Does NOT throw on non-zero exit codes, timeouts or spawn failures. Callers check the result.
 */
export async function execFileNoThrow(
	command: string,
	args: string[] = [],
	options: IShellOptions = {}
): Promise<IShellResult> {
	const start = Date.now();

	try {
		const pending = execFileAsync(command, args, {
			cwd: options.cwd,
			timeout: options.timeout,
			killSignal: 'SIGKILL',
			env: options.env ?? process.env,
			maxBuffer: 10 * 1024 * 1024, // 10MB
		});
		// Tools must never wait on stdin.
		pending.child.stdin?.end();
		const result = await pending;

		return {
			stdout: result.stdout,
			stderr: result.stderr,
			exitCode: 0,
			durationMs: Date.now() - start,
			timedOut: false,
		};
	} catch (error: unknown) {
		const durationMs = Date.now() - start;

		if (!isExecFailure(error)) {
			return { stdout: '', stderr: String(error), exitCode: null, durationMs, timedOut: false };
		}

		if (typeof error.code === 'string' && error.code !== MAX_BUFFER_CODE) {
			return {
				stdout: error.stdout ?? '',
				stderr: error.stderr || error.message,
				exitCode: null,
				durationMs,
				timedOut: false,
				spawnError: error.code,
			};
		}

		const timedOut = options.timeout !== undefined && error.killed === true && error.code !== MAX_BUFFER_CODE;

		return {
			stdout: error.stdout ?? '',
			stderr: error.stderr ?? error.message,
			exitCode: typeof error.code === 'number' ? error.code : null,
			durationMs,
			timedOut,
		};
	}
}

async function isExecutable(path: string): Promise<boolean> {
	try {
		await access(path, constants.X_OK);
		return true;
	} catch {
		return false;
	}
}

/**
 * Resolves a command the way execFile would: paths against cwd, bare names
 * through PATH. Returns null when nothing executable is found.
 */
export async function findExecutable(command: string, options: Pick<IShellOptions, 'cwd' | 'env'> = {}): Promise<string | null> {
	if (isAbsolute(command) || command.includes('/')) {
		const candidate = resolve(options.cwd ?? process.cwd(), command);
		return (await isExecutable(candidate)) ? candidate : null;
	}

	const searchPath = (options.env ?? process.env).PATH ?? '';
	for (const dir of searchPath.split(delimiter).filter(Boolean)) {
		const candidate = join(dir, command);
		if (await isExecutable(candidate)) return candidate;
	}
	return null;
}
