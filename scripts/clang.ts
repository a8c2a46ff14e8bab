import * as path from 'node:path';
import * as fs from 'node:fs';
import process from 'node:process';

import { $, popDir, pushDir, python } from './utils.ts';

export function clangBinary(clangBasePath: string, name: string): string {
	const exe = process.platform === 'win32' ? `${name}.exe` : name;
	return path.join(clangBasePath, 'Release+Asserts', 'bin', exe);
}

/**
 * Downloads Chromium's clang into `<root>/third_party/llvm-build` unless it is
 * already there. Using it avoids Xcode SDK mismatches on macOS.
 * @returns the absolute clang base path
 */
export function downloadClang(v8Dir: string, root: string): string {
	const clangBasePath = path.resolve(root, 'third_party', 'llvm-build');
	const clang = clangBinary(clangBasePath, 'clang');

	if (fs.existsSync(clang)) {
		console.log(`==> Clang already exists: ${clangBasePath}`);
		return clangBasePath;
	}

	console.log("==> Downloading Chromium's clang...");
	// update.py expects to run from the V8 checkout.
	pushDir(v8Dir);
	try {
		$(python(), [
			path.join('tools', 'clang', 'scripts', 'update.py'),
			'--output-dir',
			clangBasePath,
		]);
	} finally {
		popDir();
	}

	if (!fs.existsSync(clang)) {
		console.warn(`WARNING: Clang binary not found at ${clang}`);
		console.warn('The clang download may have failed. Build may use system clang instead.');
	}

	return clangBasePath;
}

/**
 * Prefers the downloaded `llvm-ar`, which reads the thin archives Chromium's
 * toolchain writes; falls back to `ar` from PATH.
 */
export function findArchiver(root: string): string {
	const llvmAr = clangBinary(path.resolve(root, 'third_party', 'llvm-build'), 'llvm-ar');
	return fs.existsSync(llvmAr) ? llvmAr : 'ar';
}
