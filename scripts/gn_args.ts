import type { TargetCpu, TargetOS } from './platform.ts';

export interface V8BuildOptions {
	targetOS: TargetOS;
	/** GN `target_cpu`; not limited to the host CPUs. */
	targetCpu: string;
	hostCpu: TargetCpu;
	isDebug: boolean;
	/** Absolute path of Chromium's prebuilt clang. */
	clangBasePath: string;
	/** Compiler cache wrapper such as sccache. */
	ccWrapper?: string;
	enablePointerCompression?: boolean;
	enableSandbox?: boolean;
	extraArgs?: string[];
}

/**
 * Debug builds are not supported on Windows and fall back to release.
 */
export function resolveDebug(requested: boolean, targetOS: TargetOS): boolean {
	if (requested && targetOS === 'win') {
		console.warn('Warning: Debug builds not supported on Windows, using release');
		return false;
	}

	return requested;
}

export function isCrossCompile(options: Pick<V8BuildOptions, 'targetCpu' | 'hostCpu'>): boolean {
	return options.targetCpu !== options.hostCpu;
}

export function v8GnArgs(options: V8BuildOptions): string[] {
	const { targetCpu, isDebug } = options;

	const gnArgs = [
		`is_debug=${isDebug}`,
		`target_cpu="${targetCpu}"`,
		`v8_target_cpu="${targetCpu}"`,
		'is_component_build=false',
		'v8_monolithic=true',
		'v8_use_external_startup_data=false',
		'treat_warnings_as_errors=false',
		`v8_enable_sandbox=${options.enableSandbox ?? false}`,
		`v8_enable_pointer_compression=${options.enablePointerCompression ?? false}`,

		// Keep the library free of ICU data and the Rust toolchain.
		'v8_enable_i18n_support=false',
		'v8_enable_temporal_support=false',
		'enable_rust=false',

		'clang_use_chrome_plugins=false',
		`symbol_level=${isDebug ? 1 : 0}`,
		'v8_enable_webassembly=true',
		'is_clang=true',
		// Link against the platform's libc++/libstdc++ so embedders can use it.
		'use_custom_libcxx=false',
	];

	gnArgs.push(`clang_base_path="${options.clangBasePath}"`);

	// The Debian sysroot ships a libstdc++ without C++20 support; the host
	// (or cross) toolchain provides the headers instead.
	if (options.targetOS === 'linux') {
		gnArgs.push('use_sysroot=false');
	}

	if (options.ccWrapper) {
		gnArgs.push(`cc_wrapper="${options.ccWrapper}"`);
	}

	gnArgs.push(...(options.extraArgs ?? []));

	return gnArgs;
}

export function joinGnArgs(gnArgs: string[]): string {
	return gnArgs.join(' ');
}

// Kept whole: quoted GN values may contain runs of spaces.
export function parseExtraArgs(value: string | undefined): string[] {
	const trimmed = value?.trim();
	return trimmed ? [trimmed] : [];
}
