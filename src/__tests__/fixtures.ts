import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { parsePipeline, type GateDefinition, type Pipeline } from '../parsers/index.js';
import { sameBaseline, type BaselineState, type BaselineStore } from '../storage/state-store.js';
import { BaselineConflictError } from '../utils/errors.js';
import type { GitClient } from '../utils/git.js';

type RawGate = Record<string, unknown>;

export function gateConfig(overrides: RawGate = {}): RawGate {
  return {
    name: 'Lint',
    execution: { command: ['lint', '{files}'], timeout_seconds: 10 },
    parsing: { strategy: 'exit_code' },
    success: { mode: 'exit_code' },
    capabilities: { file_types: ['.py'] },
    ...overrides,
  };
}

export function buildPipeline(gates: Record<string, RawGate>, extra: Record<string, unknown> = {}): Pipeline {
  return parsePipeline({ version: '1', active_gates: Object.keys(gates), gates, ...extra });
}

export function buildGate(overrides: RawGate = {}, id = 'lint'): GateDefinition {
  return buildPipeline({ [id]: gateConfig(overrides) }).active[0];
}

/** Command running an inline script with the current node binary. Extra args land in process.argv.slice(1). */
export function nodeScript(source: string): string[] {
  return [process.execPath, '-e', source];
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'qgate-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const full = join(root, path);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content, 'utf-8');
  }
}

export class FakeGit implements GitClient {
  diffs = new Map<string, string[]>();
  sha = 'abc123';
  branch = 'feature/x';
  /** When set, currentBranch rejects with it, as outside a repository. */
  branchError?: Error;
  diffCalls: Array<[string, string]> = [];

  async diff(refA: string, refB: string): Promise<string[]> {
    this.diffCalls.push([refA, refB]);
    const changed = this.diffs.get(`${refA}..${refB}`);
    if (changed === undefined) throw new Error(`unknown revision ${refA}`);
    return changed;
  }

  async headSha(): Promise<string> {
    return this.sha;
  }

  async currentBranch(): Promise<string> {
    if (this.branchError !== undefined) throw this.branchError;
    return this.branch;
  }
}

export class MemoryBaselineStore implements BaselineStore {
  saved: BaselineState[] = [];

  constructor(public state: BaselineState = { baseline_sha: '', failed_files: [] }) {}

  async load(): Promise<BaselineState> {
    return { ...this.state, failed_files: [...this.state.failed_files] };
  }

  async save(state: BaselineState, expected?: BaselineState): Promise<void> {
    if (expected !== undefined && !sameBaseline(this.state, expected)) {
      throw new BaselineConflictError('memory');
    }
    this.state = { ...state, failed_files: [...state.failed_files] };
    this.saved.push(this.state);
  }
}
