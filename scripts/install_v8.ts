import path from 'node:path';
import fs from 'node:fs';

import { $, capture, copyDir, copyFileToDir } from './utils.ts';

const THIN_ARCHIVE_MAGIC = '!<thin>\n';

export function isThinArchive(file: string): boolean {
	const fd = fs.openSync(file, 'r');
	try {
		const header = Buffer.alloc(THIN_ARCHIVE_MAGIC.length);
		const read = fs.readSync(fd, header, 0, header.length, 0);
		return read === header.length && header.toString('latin1') === THIN_ARCHIVE_MAGIC;
	} finally {
		fs.closeSync(fd);
	}
}

function responseFileLine(member: string): string {
	return `"${member.replace(/\\/g, '/').replace(/"/g, '\\"')}"`;
}

/**
 * Writes a self-contained copy of `src` to `dest`. A thin archive only holds
 * paths to object files in the build directory, so its members are re-added
 * by content. Regular archives are copied as they are.
 */
export function flattenThinArchive(src: string, dest: string, ar: string) {
	fs.mkdirSync(path.dirname(dest), { recursive: true });
	fs.rmSync(dest, { force: true });

	if (!isThinArchive(src)) {
		fs.copyFileSync(src, dest);
		return;
	}

	// Thin archive member paths are relative to the archive itself.
	const baseDir = path.dirname(src);
	const members = capture(ar, ['t', src])
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line !== '')
		.map((member) => path.resolve(baseDir, member));

	if (members.length === 0) {
		throw new Error(`Thin archive ${src} has no members`);
	}

	// V8 has thousands of objects, more than a command line takes on some hosts.
	const rspFile = `${dest}.rsp`;
	fs.writeFileSync(rspFile, members.map(responseFileLine).join('\n') + '\n');
	try {
		$(ar, ['rcs', dest, `@${rspFile}`]);
	} finally {
		fs.rmSync(rspFile, { force: true });
	}
}

export interface InstallOptions {
	v8Dir: string;
	/** GN output directory, relative to `v8Dir`. */
	outDir: string;
	installDir: string;
	libName: string;
	/** Subdirectory of `lib/`, such as `linux-x64-release`. */
	platformDir: string;
	ar: string;
}

/**
 * Installs the monolithic library and V8's public headers.
 * @returns the installed library path
 */
export function installV8(options: InstallOptions): string {
	const { v8Dir, installDir } = options;
	const libPath = path.join(v8Dir, options.outDir, 'obj', options.libName);
	if (!fs.existsSync(libPath)) {
		throw new Error(`Expected library not found at ${libPath}, run the build step first`);
	}

	const libArchDir = path.join(installDir, 'lib', options.platformDir);
	const dest = path.join(libArchDir, options.libName);
	console.log(`==> Installing ${options.libName} to ${libArchDir}...`);
	flattenThinArchive(libPath, dest, options.ar);

	const includeDir = path.join(installDir, 'include');
	const headers = copyDir(path.join(v8Dir, 'include'), includeDir, { ext: ['.h', '.md'] });
	console.log(`==> Installed ${headers} header files to ${includeDir}`);

	copyFileToDir(path.join(v8Dir, 'LICENSE'), installDir);

	return dest;
}
