import * as os from 'node:os';
import process from 'node:process';

import { optionalEnvVar } from './utils.ts';

export type TargetOS = 'linux' | 'mac' | 'win';
export type TargetCpu = 'x64' | 'arm64';
export type BuildType = 'debug' | 'release';

export class UnsupportedPlatformError extends Error {
	constructor(kind: 'OS' | 'architecture', value: string) {
		super(`Unsupported ${kind}: ${value}`);
		this.name = 'UnsupportedPlatformError';
	}
}

const CPU_ALIASES = new Map<string, TargetCpu>([
	['x86_64', 'x64'],
	['amd64', 'x64'],
	['x64', 'x64'],
	['aarch64', 'arm64'],
	['arm64', 'arm64'],
]);

export function targetOS(platform: NodeJS.Platform = process.platform): TargetOS {
	switch (platform) {
		case 'linux':
			return 'linux';
		case 'darwin':
			return 'mac';
		case 'win32':
			return 'win';
		default:
			throw new UnsupportedPlatformError('OS', platform);
	}
}

export function targetCpu(machine: string = os.machine()): TargetCpu {
	const cpu = CPU_ALIASES.get(machine.toLowerCase());
	if (cpu === undefined) {
		throw new UnsupportedPlatformError('architecture', machine);
	}

	return cpu;
}

/**
 * TARGET_CPU selects a cross-compilation target and is handed to GN as is,
 * so any `target_cpu` GN knows (`x86`, `arm`, ...) works. Only the host is
 * mapped and checked.
 */
export function resolveTargetCpu(machine?: string): string {
	return optionalEnvVar('TARGET_CPU') ?? targetCpu(machine);
}

export function buildType(isDebug: boolean): BuildType {
	return isDebug ? 'debug' : 'release';
}

export function outDirName(osName: TargetOS, cpu: string, type: BuildType): string {
	return `out.gn/${osName}-${cpu}-${type}`;
}

export function libraryName(osName: TargetOS): string {
	return osName === 'win' ? 'v8_monolith.lib' : 'libv8_monolith.a';
}
