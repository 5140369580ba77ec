import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { type BaselineStore, type BaselineState, EMPTY_BASELINE, sameBaseline } from './state-store.js';
import { withLock } from './file-lock.js';
import { BaselineConflictError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

const STATE_KEY = 'quality_gates';

type StateDocument = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toBaseline(section: unknown): BaselineState {
  if (!isRecord(section)) return { ...EMPTY_BASELINE, failed_files: [] };
  const sha = section.baseline_sha;
  const failed = section.failed_files;
  return {
    baseline_sha: typeof sha === 'string' ? sha : '',
    failed_files: Array.isArray(failed) ? failed.filter((f): f is string => typeof f === 'string') : [],
  };
}

/**
 * Baseline kept under the `quality_gates` key of the workspace state file.
 * Other keys in that file belong to other tools and survive every write.
 */
export class FileBaselineStore implements BaselineStore {
  private logger: Logger;

  constructor(private filePath: string) {
    this.logger = new Logger('BaselineStore');
  }

  get lockPath(): string {
    return `${this.filePath}.lock`;
  }

  async load(): Promise<BaselineState> {
    const doc = await this.readDocument();
    return toBaseline(doc[STATE_KEY]);
  }

  async save(state: BaselineState, expected?: BaselineState): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await withLock(this.lockPath, 'qgate baseline update', async () => {
      const doc = await this.readDocument();
      if (expected !== undefined && !sameBaseline(toBaseline(doc[STATE_KEY]), expected)) {
        throw new BaselineConflictError(this.filePath);
      }
      doc[STATE_KEY] = { baseline_sha: state.baseline_sha, failed_files: [...state.failed_files] };

      const tmpPath = `${this.filePath}.${process.pid}.tmp`;
      await writeFile(tmpPath, JSON.stringify(doc, null, 2) + '\n', 'utf-8');
      await rename(tmpPath, this.filePath);
    });
    this.logger.debug(`Baseline saved to ${this.filePath} (sha=${state.baseline_sha || '-'}, failed=${state.failed_files.length})`);
  }

  private async readDocument(): Promise<StateDocument> {
    let data: string;
    try {
      data = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return {};
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(data);
      if (isRecord(parsed)) return parsed;
    } catch {
      this.logger.warn(`State file ${this.filePath} is not valid JSON, starting from an empty baseline`);
      return {};
    }
    this.logger.warn(`State file ${this.filePath} is not a JSON object, starting from an empty baseline`);
    return {};
  }
}
