import process from 'node:process';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { build_v8, resolveBuildTarget } from './build_v8.ts';
import { findArchiver } from './clang.ts';
import { clone_v8 } from './clone_v8.ts';
import { installV8 } from './install_v8.ts';
import { libraryName } from './platform.ts';
import { CommandError, maybeSetupDepotTools, pushDir, restoreDir } from './utils.ts';

export const STEPS = ['clone', 'build', 'install'] as const;
export type Step = (typeof STEPS)[number];

export interface CliOptions {
	steps: Step[];
	debug: boolean;
	help: boolean;
}

const USAGE = `Usage: ci.ts [clone] [build] [install] [--debug]

Fetches V8 with depot_tools and builds it as a static library.

Steps run in the order clone, build, install. Without a step, all run.

Options:
  --debug   Build debug version (not supported on Windows)
  --help    Show this message`;

function isStep(arg: string): arg is Step {
	return STEPS.some((step) => step === arg);
}

export function parseArgs(args: string[]): CliOptions {
	for (const arg of args) {
		if (!isStep(arg) && arg !== '--debug' && arg !== '--help' && arg !== '-h') {
			throw new Error(`Unknown argument "${arg}"\n\n${USAGE}`);
		}
	}

	const selected = STEPS.filter((step) => args.includes(step));

	return {
		steps: selected.length > 0 ? selected : [...STEPS],
		debug: args.includes('--debug'),
		help: args.includes('--help') || args.includes('-h'),
	};
}

export function exitCodeFor(err: unknown): number {
	return err instanceof CommandError ? err.exitCode : 1;
}

export function run(root: string, options: CliOptions) {
	const installDir = path.join(root, 'dist', 'v8');

	// Only clone and build call depot_tools.
	const depotToolsDir =
		options.steps.includes('clone') || options.steps.includes('build')
			? maybeSetupDepotTools(root)
			: undefined;

	if (depotToolsDir !== undefined && options.steps.includes('clone')) {
		clone_v8(root, depotToolsDir);
	}

	if (!options.steps.includes('build') && !options.steps.includes('install')) {
		return;
	}

	const target = resolveBuildTarget(root, options.debug);

	if (depotToolsDir !== undefined && options.steps.includes('build')) {
		build_v8(target, depotToolsDir);
	}

	if (options.steps.includes('install')) {
		const dest = installV8({
			v8Dir: target.v8Dir,
			outDir: target.outDir,
			installDir,
			libName: libraryName(target.targetOS),
			platformDir: `${target.targetOS}-${target.targetCpu}-${target.buildType}`,
			ar: findArchiver(root),
		});
		console.log(`==> Installed ${dest}`);
	}
}

function main() {
	const __dirname = path.dirname(fileURLToPath(import.meta.url));
	const root = path.join(__dirname, '..');

	try {
		const options = parseArgs(process.argv.slice(2));
		if (options.help) {
			console.log(USAGE);
			return;
		}

		pushDir(root);
		run(root, options);
	} catch (err) {
		console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
		process.exitCode = exitCodeFor(err);
	} finally {
		restoreDir();
	}
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
	main();
}
