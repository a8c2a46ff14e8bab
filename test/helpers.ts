import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { SpawnSyncReturns } from 'node:child_process';

export function spawnResult(
	status: number | null,
	stdout = '',
	signal: NodeJS.Signals | null = null
): SpawnSyncReturns<string> {
	return { pid: 1, output: [null, stdout, ''], stdout, stderr: '', status, signal };
}

export function makeTempDir(prefix: string): string {
	return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function writeFile(file: string, content: string | Buffer = '') {
	fs.mkdirSync(path.dirname(file), { recursive: true });
	fs.writeFileSync(file, content);
}

/** Saves the listed environment variables and returns a function that restores them. */
export function saveEnv(...names: string[]): () => void {
	const saved = new Map(names.map((name) => [name, process.env[name]]));
	return () => {
		for (const [name, value] of saved) {
			if (value === undefined) {
				delete process.env[name];
			} else {
				process.env[name] = value;
			}
		}
	};
}

/** Makes `process.platform` report `platform` and returns a function that undoes it. */
export function stubPlatform(platform: NodeJS.Platform): () => void {
	const original = Object.getOwnPropertyDescriptor(process, 'platform');
	Object.defineProperty(process, 'platform', { value: platform, configurable: true });
	return () => {
		if (original) {
			Object.defineProperty(process, 'platform', original);
		}
	};
}
