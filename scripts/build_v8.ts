import path from 'node:path';
import fs from 'node:fs';

import { downloadClang } from './clang.ts';
import { isCrossCompile, joinGnArgs, parseExtraArgs, resolveDebug, v8GnArgs } from './gn_args.ts';
import {
	buildType,
	libraryName,
	outDirName,
	resolveTargetCpu,
	targetCpu,
	targetOS,
	type BuildType,
	type TargetCpu,
	type TargetOS,
} from './platform.ts';
import {
	$,
	boolean,
	depotTool,
	findExecutable,
	optionalEnvVar,
	popDir,
	pushDir,
} from './utils.ts';

export interface V8BuildTarget {
	root: string;
	v8Dir: string;
	/** GN output directory, relative to `v8Dir`. */
	outDir: string;
	targetOS: TargetOS;
	targetCpu: string;
	hostCpu: TargetCpu;
	isDebug: boolean;
	buildType: BuildType;
}

export function formatSize(bytes: number): string {
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function resolveBuildTarget(root: string, debugRequested: boolean): V8BuildTarget {
	const os = targetOS();
	const isDebug = resolveDebug(debugRequested, os);
	const cpu = resolveTargetCpu();
	const type = buildType(isDebug);

	return {
		root,
		v8Dir: path.join(root, 'v8'),
		outDir: outDirName(os, cpu, type),
		targetOS: os,
		targetCpu: cpu,
		hostCpu: targetCpu(),
		isDebug,
		buildType: type,
	};
}

export function libraryPath(target: V8BuildTarget): string {
	return path.join(target.v8Dir, target.outDir, 'obj', libraryName(target.targetOS));
}

/**
 * Generates the GN build directory and compiles `v8_monolith`.
 * @returns the clang base path the build used
 */
export function build_v8(target: V8BuildTarget, depotToolsDir: string): string {
	const { v8Dir, outDir, targetOS: os, targetCpu: cpu, hostCpu, isDebug } = target;
	if (!fs.existsSync(v8Dir)) {
		throw new Error('v8 directory not found. Run the clone step first.');
	}

	console.log(`==> Building V8 for ${os}-${cpu} (${target.buildType})...`);

	const clangBasePath = downloadClang(v8Dir, target.root);
	console.log(`==> Using clang at: ${clangBasePath}`);

	if (os === 'linux' && isCrossCompile({ targetCpu: cpu, hostCpu })) {
		console.log(`==> Cross-compiling from ${hostCpu} to ${cpu}`);
	}

	const sccache = findExecutable('sccache');
	if (sccache) {
		console.log(`==> Using sccache: ${sccache}`);
	} else {
		console.log('==> sccache not found, building without compilation cache');
	}

	const gnArgs = v8GnArgs({
		targetOS: os,
		targetCpu: cpu,
		hostCpu,
		isDebug,
		clangBasePath,
		ccWrapper: sccache,
		enablePointerCompression: boolean(optionalEnvVar('V8_ENABLE_POINTER_COMPRESSION')),
		enableSandbox: boolean(optionalEnvVar('V8_ENABLE_SANDBOX')),
		extraArgs: parseExtraArgs(optionalEnvVar('GN_EXTRA_ARGS')),
	});

	pushDir(v8Dir);
	try {
		console.log('==> Running gn gen...');
		$(depotTool('gn', depotToolsDir), ['gen', outDir, `--args=${joinGnArgs(gnArgs)}`]);

		console.log('==> Building with ninja...');
		$(depotTool('ninja', depotToolsDir), ['-C', outDir, 'v8_monolith']);
	} finally {
		popDir();
	}

	console.log('==> Build complete!');

	const libPath = libraryPath(target);
	const stats = fs.statSync(libPath, { throwIfNoEntry: false });
	if (stats) {
		console.log(`\nStatic library: ${libPath}`);
		console.log(`Size: ${formatSize(stats.size)}`);
	} else {
		console.warn(`\nWarning: Expected library not found at ${libPath}`);
		console.warn('Check the output directory for the built library.');
	}

	console.log(`Headers location: ${path.join(v8Dir, 'include')}`);

	return clangBasePath;
}
