import { readFile } from 'fs/promises';
import { Logger } from '../utils/logger.js';

/** Read-only view of the workflow state another tool maintains. */
export interface PhaseStateProvider {
  parentBranch(currentBranch: string): Promise<string | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `workflow.parent_branch` from the workspace state file. State recorded
 * for a different branch is ignored.
 */
export class FilePhaseState implements PhaseStateProvider {
  private logger = new Logger('PhaseState');

  constructor(private filePath: string) {}

  async parentBranch(currentBranch: string): Promise<string | undefined> {
    let doc: unknown;
    try {
      doc = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn(`Could not read phase state from ${this.filePath}: ${String(error)}`);
      }
      return undefined;
    }

    if (!isRecord(doc)) return undefined;
    if (typeof doc.branch === 'string' && doc.branch !== currentBranch) {
      this.logger.debug(`Phase state tracks ${doc.branch}, not ${currentBranch}`);
      return undefined;
    }

    const workflow = doc.workflow;
    if (isRecord(workflow) && typeof workflow.parent_branch === 'string' && workflow.parent_branch) {
      return workflow.parent_branch;
    }
    return undefined;
  }
}
