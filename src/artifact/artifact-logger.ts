import { mkdir, readdir, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { IArtifactLoggerOptions, IArtifactRecord } from './types.js';

const MAX_NAME_ATTEMPTS = 5;

function compactTimestamp(date: Date): string {
	// 2026-10-19T14:27:00.123Z -> 20261019T142700123Z
	return date.toISOString().replace(/[-:.]/g, '');
}

function safeName(id: string): string {
	return id.toLowerCase().replace(/[^a-z0-9_-]+/g, '_');
}

/**
 * Persists failed-gate diagnostics as timestamped JSON files and keeps the
 * directory bounded: after every write the oldest files beyond maxFiles are removed.
 */
export class ArtifactLogger {
	private logger: Logger;
	private options: IArtifactLoggerOptions;
	private sequence = 0;

	constructor(options: IArtifactLoggerOptions) {
		this.options = options;
		this.logger = new Logger('ArtifactLogger');
	}

	/**
	 * Writes one artifact and returns its path, or undefined when logging is
	 * disabled or the write failed.
	 */
	async persist(record: IArtifactRecord): Promise<string | undefined> {
		if (!this.options.enabled) return undefined;

		const now = new Date();
		const payload = JSON.stringify({ timestamp: now.toISOString(), ...record }, null, 2);

		try {
			await mkdir(this.options.outputDir, { recursive: true });
			const path = await this.writeUnique(now, record.gate_id, payload);
			this.logger.debug(`Artifact written: ${path}`);
			await this.prune();
			return path;
		} catch (error) {
			this.logger.warn(`Could not write artifact for ${record.gate_id}: ${errorMessage(error)}`);
			return undefined;
		}
	}

	private async writeUnique(now: Date, gateId: string, payload: string): Promise<string> {
		for (let attempt = 1; ; attempt++) {
			this.sequence += 1;
			const name = `${compactTimestamp(now)}_${String(this.sequence).padStart(4, '0')}_${safeName(gateId)}.json`;
			const path = join(this.options.outputDir, name);
			try {
				await writeFile(path, payload, { encoding: 'utf-8', flag: 'wx' });
				return path;
			} catch (error) {
				if ((error as NodeJS.ErrnoException).code !== 'EEXIST' || attempt >= MAX_NAME_ATTEMPTS) throw error;
			}
		}
	}

	/** Removes the oldest artifacts beyond maxFiles (by mtime, then name). Returns removed paths. */
	async prune(): Promise<string[]> {
		let names: string[];
		try {
			names = (await readdir(this.options.outputDir)).filter(name => name.endsWith('.json'));
		} catch (error) {
			if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
			throw error;
		}

		if (names.length <= this.options.maxFiles) return [];

		const entries = await Promise.all(names.map(async name => {
			const path = join(this.options.outputDir, name);
			return { name, path, mtimeMs: (await stat(path)).mtimeMs };
		}));

		entries.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

		const stale = entries.slice(this.options.maxFiles);
		for (const entry of stale) {
			try {
				await unlink(entry.path);
			} catch (error) {
				if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
			}
		}

		if (stale.length > 0) this.logger.debug(`Pruned ${stale.length} old artifact(s)`);
		return stale.map(e => e.path);
	}
}
