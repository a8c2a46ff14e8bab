import * as path from 'node:path';
import * as fs from 'node:fs';

export const CREL_FLAG_LINE = '      cflags += [ "-Wa,--crel,--allow-experimental-crel" ]\n';

export type PatchResult = 'missing' | 'patched' | 'unchanged';

export function stripCrelFlag(content: string): string {
	return content.split(CREL_FLAG_LINE).join('');
}

/**
 * Removes the `--allow-experimental-crel` assembler flag from V8's compiler
 * config. Objects built with it fail to link with older toolchains.
 */
export function patchCrelFlag(v8Dir: string): PatchResult {
	const buildGn = path.join(v8Dir, 'build', 'config', 'compiler', 'BUILD.gn');
	if (!fs.existsSync(buildGn)) {
		console.warn(`Warning: ${buildGn} not found, skipping crel patch`);
		return 'missing';
	}

	console.log('==> Removing --allow-experimental-crel flag from BUILD.gn...');
	const content = fs.readFileSync(buildGn, 'utf8');
	const patched = stripCrelFlag(content);

	if (patched === content) {
		console.log('==> crel flag not found or already removed');
		return 'unchanged';
	}

	fs.writeFileSync(buildGn, patched);
	console.log('==> Patched BUILD.gn to remove crel flag');
	return 'patched';
}
