export interface BaselineState {
  baseline_sha: string;
  failed_files: string[];
}

export const EMPTY_BASELINE: Readonly<BaselineState> = Object.freeze({ baseline_sha: '', failed_files: [] });

export function sameBaseline(a: BaselineState, b: BaselineState): boolean {
  return a.baseline_sha === b.baseline_sha
    && a.failed_files.length === b.failed_files.length
    && a.failed_files.every((file, i) => file === b.failed_files[i]);
}

/**
 * Persisted auto-scope baseline. Implementations serialize writers and
 * reject a concurrent one rather than overwrite its update. When `expected`
 * is given, save is a compare-and-swap: it throws BaselineConflictError if
 * the stored state no longer equals it.
 */
export interface BaselineStore {
  load(): Promise<BaselineState>;
  save(state: BaselineState, expected?: BaselineState): Promise<void>;
}
