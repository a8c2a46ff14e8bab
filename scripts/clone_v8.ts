import path from 'node:path';
import fs from 'node:fs';

import { patchCrelFlag } from './patch.ts';
import { $, depotTool, popDir, pushDir, v8Version } from './utils.ts';

export function clone_v8(root: string, depotToolsDir: string) {
	const v8Dir = path.join(root, 'v8');
	const version = v8Version();

	if (!fs.existsSync(v8Dir)) {
		console.log('==> Fetching V8...');
		pushDir(root);
		try {
			$(depotTool('fetch', depotToolsDir), ['v8']);
		} finally {
			popDir();
		}
	}

	pushDir(v8Dir);
	try {
		console.log(`==> Checking out V8 version ${version}...`);
		$('git', ['checkout', version]);

		console.log('==> Syncing dependencies...');
		$(depotTool('gclient', depotToolsDir), ['sync', '-D']);
	} finally {
		popDir();
	}

	patchCrelFlag(v8Dir);

	console.log('==> V8 clone complete!');
}
