import fs from 'node:fs';
import path from 'node:path';
import { spawnSync } from 'node:child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { build_v8, formatSize, libraryPath, resolveBuildTarget } from '../scripts/build_v8.ts';
import { clangBinary, downloadClang, findArchiver } from '../scripts/clang.ts';
import { makeTempDir, saveEnv, spawnResult, stubPlatform, writeFile } from './helpers.ts';

vi.mock('node:child_process', () => ({ spawnSync: vi.fn() }));

const start = process.cwd();
let restorePlatform: () => void;

beforeEach(() => {
	restorePlatform = stubPlatform('linux');
	vi.spyOn(console, 'log').mockImplementation(() => {});
	vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
	restorePlatform();
	process.chdir(start);
	vi.restoreAllMocks();
	vi.mocked(spawnSync).mockReset();
});

describe('formatSize', () => {
	it('prints megabytes with one decimal', () => {
		expect(formatSize(1.5 * 1024 * 1024)).toBe('1.5 MB');
		expect(formatSize(0)).toBe('0.0 MB');
	});
});

describe('build_v8', () => {
	const restoreEnv = saveEnv(
		'PATH',
		'TARGET_CPU',
		'GN_EXTRA_ARGS',
		'V8_ENABLE_POINTER_COMPRESSION',
		'V8_ENABLE_SANDBOX'
	);
	let root: string;
	let clangBasePath: string;
	let bin: string;

	beforeEach(() => {
		root = makeTempDir('v8-prebuilt-build-');
		clangBasePath = path.join(root, 'third_party', 'llvm-build');
		bin = path.join(root, 'bin');
		writeFile(path.join(root, 'v8', 'include', 'v8.h'));
		writeFile(clangBinary(clangBasePath, 'clang'));
		writeFile(path.join(bin, 'sccache'));

		process.env['PATH'] = bin;
		process.env['TARGET_CPU'] = 'arm64';
		process.env['GN_EXTRA_ARGS'] = 'v8_enable_object_print=true';
		delete process.env['V8_ENABLE_POINTER_COMPRESSION'];
		delete process.env['V8_ENABLE_SANDBOX'];
		vi.mocked(spawnSync).mockReturnValue(spawnResult(0));
	});

	afterEach(() => {
		restoreEnv();
	});

	it('resolves the target from the host and TARGET_CPU', () => {
		const target = resolveBuildTarget(root, true);

		expect(target).toMatchObject({
			v8Dir: path.join(root, 'v8'),
			outDir: 'out.gn/linux-arm64-debug',
			targetOS: 'linux',
			targetCpu: 'arm64',
			isDebug: true,
			buildType: 'debug',
		});
		expect(libraryPath(target)).toBe(
			path.join(root, 'v8', 'out.gn', 'linux-arm64-debug', 'obj', 'libv8_monolith.a')
		);
	});

	it('runs gn gen and ninja in the V8 checkout', () => {
		const target = resolveBuildTarget(root, false);
		const cwds: string[] = [];
		vi.mocked(spawnSync).mockImplementation(() => {
			cwds.push(process.cwd());
			return spawnResult(0);
		});

		expect(build_v8(target, path.join(root, 'depot_tools'))).toBe(clangBasePath);

		const calls = vi.mocked(spawnSync).mock.calls;
		expect(calls).toHaveLength(2);
		expect(calls[0][0]).toBe('gn');
		expect(calls[0][1]).toEqual([
			'gen',
			'out.gn/linux-arm64-release',
			'--args=is_debug=false target_cpu="arm64" v8_target_cpu="arm64" is_component_build=false ' +
				'v8_monolithic=true v8_use_external_startup_data=false treat_warnings_as_errors=false ' +
				'v8_enable_sandbox=false v8_enable_pointer_compression=false v8_enable_i18n_support=false ' +
				'v8_enable_temporal_support=false enable_rust=false clang_use_chrome_plugins=false ' +
				'symbol_level=0 v8_enable_webassembly=true is_clang=true use_custom_libcxx=false ' +
				`clang_base_path="${clangBasePath}" use_sysroot=false ` +
				`cc_wrapper="${path.join(bin, 'sccache')}" v8_enable_object_print=true`,
		]);
		expect(calls[1][0]).toBe('ninja');
		expect(calls[1][1]).toEqual(['-C', 'out.gn/linux-arm64-release', 'v8_monolith']);
		expect(cwds).toEqual([target.v8Dir, target.v8Dir]);
		expect(process.cwd()).toBe(start);
	});

	it('reports the library size', () => {
		const target = resolveBuildTarget(root, false);
		writeFile(libraryPath(target), Buffer.alloc(1.5 * 1024 * 1024));

		build_v8(target, path.join(root, 'depot_tools'));

		expect(console.log).toHaveBeenCalledWith('Size: 1.5 MB');
		expect(console.log).toHaveBeenCalledWith(`Headers location: ${path.join(target.v8Dir, 'include')}`);
	});

	it('warns when the library is missing', () => {
		const target = resolveBuildTarget(root, false);

		build_v8(target, path.join(root, 'depot_tools'));

		expect(console.warn).toHaveBeenCalledWith(`\nWarning: Expected library not found at ${libraryPath(target)}`);
	});

	it('builds without a compiler cache when sccache is absent', () => {
		process.env['PATH'] = path.join(root, 'empty');
		const target = resolveBuildTarget(root, false);

		build_v8(target, path.join(root, 'depot_tools'));

		const gnArgs = vi.mocked(spawnSync).mock.calls[0][1];
		expect(gnArgs?.[2]).not.toContain('cc_wrapper');
		expect(console.log).toHaveBeenCalledWith('==> sccache not found, building without compilation cache');
	});

	it('hands a TARGET_CPU outside the host kinds to GN', () => {
		process.env['TARGET_CPU'] = 'x86';
		const target = resolveBuildTarget(root, false);

		build_v8(target, path.join(root, 'depot_tools'));

		const gnArgs = vi.mocked(spawnSync).mock.calls[0][1];
		expect(gnArgs?.[1]).toBe('out.gn/linux-x86-release');
		expect(gnArgs?.[2]).toContain('--args=is_debug=false target_cpu="x86" v8_target_cpu="x86" ');
	});

	it('requires a V8 checkout', () => {
		const target = resolveBuildTarget(path.join(root, 'elsewhere'), false);

		expect(() => build_v8(target, path.join(root, 'depot_tools'))).toThrow(
			'v8 directory not found. Run the clone step first.'
		);
		expect(spawnSync).not.toHaveBeenCalled();
	});
});

describe('downloadClang', () => {
	it('reuses an existing download', () => {
		const root = makeTempDir('v8-prebuilt-clang-');
		const base = path.join(root, 'third_party', 'llvm-build');
		writeFile(clangBinary(base, 'clang'));

		expect(downloadClang(path.join(root, 'v8'), root)).toBe(base);
		expect(spawnSync).not.toHaveBeenCalled();
	});

	it('runs update.py from the V8 checkout and warns when clang is still missing', () => {
		const root = makeTempDir('v8-prebuilt-clang-');
		const v8Dir = path.join(root, 'v8');
		const base = path.join(root, 'third_party', 'llvm-build');
		fs.mkdirSync(v8Dir);
		let cwd = '';
		vi.mocked(spawnSync).mockImplementation(() => {
			cwd = process.cwd();
			return spawnResult(0);
		});

		expect(downloadClang(v8Dir, root)).toBe(base);

		expect(vi.mocked(spawnSync).mock.calls[0][0]).toBe('python3');
		expect(vi.mocked(spawnSync).mock.calls[0][1]).toEqual([
			path.join('tools', 'clang', 'scripts', 'update.py'),
			'--output-dir',
			base,
		]);
		expect(cwd).toBe(v8Dir);
		expect(console.warn).toHaveBeenCalledWith(`WARNING: Clang binary not found at ${clangBinary(base, 'clang')}`);
	});
});

describe('findArchiver', () => {
	it('prefers the downloaded llvm-ar', () => {
		const root = makeTempDir('v8-prebuilt-ar-');
		expect(findArchiver(root)).toBe('ar');

		const llvmAr = clangBinary(path.join(root, 'third_party', 'llvm-build'), 'llvm-ar');
		writeFile(llvmAr);
		expect(findArchiver(root)).toBe(llvmAr);
	});
});
