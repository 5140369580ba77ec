import { execFileNoThrow, type IShellResult } from './shell.js';
import { GitError } from './errors.js';

/** The git plumbing the engine consumes. */
export interface GitClient {
	/** Paths changed between two refs (`git diff --name-only a..b`). */
	diff(refA: string, refB: string): Promise<string[]>;
	headSha(): Promise<string>;
	currentBranch(): Promise<string>;
}

async function git(cwd: string, args: string[]): Promise<IShellResult> {
	return execFileNoThrow('git', args, { cwd, timeout: 30_000 });
}

function ensureOk(result: IShellResult, args: string[]): string {
	if (result.exitCode !== 0) {
		const stderr = result.stderr.trim();
		throw new GitError(`git ${args.join(' ')} failed${stderr ? `: ${stderr}` : ''}`, args, stderr);
	}
	return result.stdout;
}

export async function getCurrentBranch(cwd: string): Promise<string> {
	const args = ['rev-parse', '--abbrev-ref', 'HEAD'];
	return ensureOk(await git(cwd, args), args).trim();
}

export async function getHeadSha(cwd: string): Promise<string> {
	const args = ['rev-parse', 'HEAD'];
	return ensureOk(await git(cwd, args), args).trim();
}

export async function diffNames(cwd: string, refA: string, refB: string): Promise<string[]> {
	const args = ['diff', '--name-only', `${refA}..${refB}`];
	return ensureOk(await git(cwd, args), args)
		.split(/\r?\n/)
		.map(line => line.trim())
		.filter(Boolean);
}

export class CliGitClient implements GitClient {
	constructor(private cwd: string) {}

	diff(refA: string, refB: string): Promise<string[]> {
		return diffNames(this.cwd, refA, refB);
	}

	headSha(): Promise<string> {
		return getHeadSha(this.cwd);
	}

	currentBranch(): Promise<string> {
		return getCurrentBranch(this.cwd);
	}
}
