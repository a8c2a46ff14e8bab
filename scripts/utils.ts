import process from 'node:process';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { spawnSync, type SpawnSyncReturns } from 'node:child_process';

import VERSIONS from '../build-versions.json' with { type: 'json' };

export const DEPOT_TOOLS_GIT =
	'https://chromium.googlesource.com/chromium/tools/depot_tools.git';

export class CommandError extends Error {
	readonly command: string;
	readonly exitCode: number;

	constructor(command: string, ret: SpawnSyncReturns<unknown>) {
		const reason = ret.error
			? ret.error.message
			: ret.signal
				? `killed by ${ret.signal}`
				: `exited with code ${ret.status}`;
		super(`Command "${command}" ${reason}`);
		this.name = 'CommandError';
		this.command = command;
		this.exitCode = typeof ret.status === 'number' && ret.status !== 0 ? ret.status : 1;
	}
}

export function setEnvVar(name: string, value: string) {
	process.env[name] = value;
}

export function optionalEnvVar(name: string): string | undefined {
	const value = process.env[name]?.trim();
	return value ? value : undefined;
}

const gDirStack: string[] = [];

export function pushDir(dir: string) {
	gDirStack.push(process.cwd());
	process.chdir(dir);
}

export function popDir() {
	const dir = gDirStack.pop();
	if (dir === undefined) {
		throw new Error('Directory stack is empty');
	}

	process.chdir(dir);
}

export function restoreDir() {
	if (gDirStack.length > 0) {
		process.chdir(gDirStack[0]);
	}

	gDirStack.length = 0;
}

export function python(): string {
	return 'python3';
}

function isWindows(): boolean {
	return process.platform === 'win32';
}

export function findExecutable(command: string): string | undefined {
	const pathEnv = process.env['PATH'] ?? '';
	const pathExt = isWindows() ? ['.exe', '.bat', '.cmd', '.ps1'] : [''];

	for (const envPart of pathEnv.split(path.delimiter)) {
		if (envPart === '') {
			continue;
		}

		for (const ext of pathExt) {
			const p = path.join(envPart, command + ext);
			if (fs.statSync(p, { throwIfNoEntry: false })?.isFile()) {
				return p;
			}
		}
	}

	return undefined;
}

/**
 * Quotes an argument for cmd.exe, which is only involved when spawning the
 * depot_tools `.bat` wrappers.
 */
export function quoteWindowsArg(arg: string): string {
	if (arg !== '' && !/[\s"]/.test(arg)) {
		return arg;
	}

	return `"${arg.replace(/"/g, '\\"')}"`;
}

function spawnTool(command: string, args: string[], capture: boolean) {
	const useShell = isWindows() && /\.(bat|cmd)$/i.test(command);
	const argv = useShell ? args.map(quoteWindowsArg) : args;
	const file = useShell ? quoteWindowsArg(command) : command;

	return spawnSync(file, argv, {
		stdio: capture ? ['ignore', 'pipe', 'inherit'] : 'inherit',
		encoding: 'utf8',
		shell: useShell,
	});
}

export function $(command: string, args: string[] = []) {
	const line = [command, ...args].join(' ');
	console.log(`> ${line}`);
	const ret = spawnTool(command, args, false);

	if (ret.error || ret.status !== 0) {
		throw new CommandError(line, ret);
	}

	return ret;
}

/**
 * Runs a command like {@link $} but returns its trimmed stdout.
 */
export function capture(command: string, args: string[] = []): string {
	const line = [command, ...args].join(' ');
	console.log(`> ${line}`);
	const ret = spawnTool(command, args, true);

	if (ret.error || ret.status !== 0) {
		throw new CommandError(line, ret);
	}

	return ret.stdout.trim();
}

export function v8Version(): string {
	return optionalEnvVar('V8_VERSION') ?? VERSIONS.v8.branch;
}

export function depotTool(name: string, depotToolsDir: string): string {
	return isWindows() ? path.join(depotToolsDir, `${name}.bat`) : name;
}

export function maybeSetupDepotTools(root: string): string {
	const depotToolsDir = path.join(root, 'depot_tools');

	if (!fs.existsSync(depotToolsDir)) {
		console.log('==> Cloning depot_tools...');
		$('git', ['clone', DEPOT_TOOLS_GIT, depotToolsDir]);
	} else {
		console.log('==> depot_tools already exists, skipping clone');
	}

	// Use the locally installed Visual Studio instead of Google's toolchain.
	setEnvVar('DEPOT_TOOLS_WIN_TOOLCHAIN', '0');
	process.env['PATH'] = depotToolsDir + path.delimiter + (process.env['PATH'] ?? '');

	return depotToolsDir;
}

export function boolean(value: unknown): boolean {
	switch (typeof value) {
		case 'string':
			return ['true', 't', 'yes', 'y', 'on', '1'].includes(
				value.trim().toLowerCase()
			);

		case 'number':
			return value === 1;

		case 'boolean':
			return value;

		default:
			return false;
	}
}

/**
 * Walks a directory recursively and calls the filter function for each file/directory
 * @param dir Directory to walk
 * @param filter Function that decides whether to include a file or traverse into a directory
 * @param callback Function called for each matched file
 */
export function walkDir(
	dir: string,
	filter: (filePath: string, stats: fs.Stats) => boolean,
	callback: (filePath: string) => void
) {
	if (!fs.existsSync(dir)) {
		return;
	}

	for (const entry of fs.readdirSync(dir)) {
		const fullPath = path.join(dir, entry);
		const stats = fs.statSync(fullPath);

		if (filter(fullPath, stats)) {
			if (stats.isDirectory()) {
				walkDir(fullPath, filter, callback);
			} else if (stats.isFile()) {
				callback(fullPath);
			}
		}
	}
}

/**
 * Copies every file under `src` whose extension is listed in `ext`, keeping
 * the directory structure. Returns the number of files copied.
 */
export function copyDir(src: string, dest: string, options: { ext: string[] }): number {
	let copied = 0;

	walkDir(
		src,
		(filePath, stats) => stats.isDirectory() || options.ext.includes(path.extname(filePath)),
		(filePath) => {
			const destPath = path.join(dest, path.relative(src, filePath));
			fs.mkdirSync(path.dirname(destPath), { recursive: true });
			fs.copyFileSync(filePath, destPath);
			copied++;
		}
	);

	return copied;
}

export function copyFileToDir(src: string, dest: string): boolean {
	if (!fs.existsSync(src)) {
		return false;
	}

	fs.mkdirSync(dest, { recursive: true });
	fs.copyFileSync(src, path.join(dest, path.basename(src)));
	return true;
}
