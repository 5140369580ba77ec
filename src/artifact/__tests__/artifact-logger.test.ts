import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, utimes, writeFile } from 'fs/promises';
import { basename, join } from 'path';
import { ArtifactLogger } from '../artifact-logger.js';
import type { IArtifactRecord } from '../types.js';
import { makeTempDir, removeDir } from '../../__tests__/fixtures.js';

function record(gateId: string): IArtifactRecord {
	return {
		gate_id: gateId,
		gate_name: 'Ruff Lint',
		command: ['ruff', 'check', 'a.py'],
		cwd: null,
		files: ['a.py'],
		status: 'failed',
		score: 'Fail (exit=1)',
		exit_code: 1,
		timed_out: false,
		duration_ms: 12,
		issues: [],
		environment: { tool_path: '/usr/bin/ruff', platform: 'linux-x64', node_version: 'v20.0.0', tool_version: 'ruff 0.4.0' },
		stdout: 'full stdout',
		stderr: 'full stderr',
	};
}

describe('ArtifactLogger', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		await removeDir(dir);
	});

	it('should write a timestamped JSON artifact with the full streams', async () => {
		const logger = new ArtifactLogger({ enabled: true, outputDir: join(dir, 'logs'), maxFiles: 10 });

		const path = await logger.persist(record('lint'));

		expect(path).toBeDefined();
		expect(basename(path ?? '')).toMatch(/^\d{8}T\d{9}Z_0001_lint\.json$/);
		const written: unknown = JSON.parse(await readFile(path ?? '', 'utf-8'));
		expect(written).toMatchObject({ gate_id: 'lint', stdout: 'full stdout', stderr: 'full stderr', exit_code: 1 });
	});

	it('should give every artifact a distinct name', async () => {
		const logger = new ArtifactLogger({ enabled: true, outputDir: dir, maxFiles: 10 });

		const first = await logger.persist(record('lint'));
		const second = await logger.persist(record('lint'));

		expect(first).not.toBe(second);
		expect(await readdir(dir)).toHaveLength(2);
	});

	it('should sanitize the gate id in the file name', async () => {
		const logger = new ArtifactLogger({ enabled: true, outputDir: dir, maxFiles: 10 });
		const path = await logger.persist(record('Gate 1/Lint'));
		expect(basename(path ?? '')).toMatch(/_gate_1_lint\.json$/);
	});

	it('should return undefined and write nothing when disabled', async () => {
		const logger = new ArtifactLogger({ enabled: false, outputDir: join(dir, 'logs'), maxFiles: 10 });

		expect(await logger.persist(record('lint'))).toBeUndefined();
		expect(await readdir(dir)).toEqual([]);
	});

	it('should return undefined when the directory cannot be created', async () => {
		const blocker = join(dir, 'file');
		await writeFile(blocker, 'not a directory');
		const logger = new ArtifactLogger({ enabled: true, outputDir: join(blocker, 'logs'), maxFiles: 10 });

		expect(await logger.persist(record('lint'))).toBeUndefined();
	});

	it('should prune the oldest artifacts beyond maxFiles', async () => {
		const names = ['a.json', 'b.json', 'c.json'];
		for (const [i, name] of names.entries()) {
			const path = join(dir, name);
			await writeFile(path, '{}');
			const time = new Date(Date.UTC(2026, 0, 1, 0, 0, i));
			await utimes(path, time, time);
		}
		await writeFile(join(dir, 'notes.txt'), 'kept');
		const logger = new ArtifactLogger({ enabled: true, outputDir: dir, maxFiles: 2 });

		const removed = await logger.prune();

		expect(removed).toEqual([join(dir, 'a.json')]);
		expect((await readdir(dir)).sort()).toEqual(['b.json', 'c.json', 'notes.txt']);
	});

	it('should break mtime ties by name', async () => {
		const time = new Date(Date.UTC(2026, 0, 1));
		for (const name of ['x.json', 'y.json', 'z.json']) {
			await writeFile(join(dir, name), '{}');
			await utimes(join(dir, name), time, time);
		}
		const logger = new ArtifactLogger({ enabled: true, outputDir: dir, maxFiles: 1 });

		expect((await logger.prune()).sort()).toEqual([join(dir, 'x.json'), join(dir, 'y.json')]);
		expect(await readdir(dir)).toEqual(['z.json']);
	});

	it('should keep the newest artifacts when persisting beyond the limit', async () => {
		const logger = new ArtifactLogger({ enabled: true, outputDir: dir, maxFiles: 2 });

		await logger.persist(record('one'));
		await logger.persist(record('two'));
		const last = await logger.persist(record('three'));

		const remaining = await readdir(dir);
		expect(remaining).toHaveLength(2);
		expect(remaining).toContain(basename(last ?? ''));
	});
});
