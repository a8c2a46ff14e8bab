import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['test/**/*.test.ts'],
		// The build scripts change the working directory, which worker threads cannot do.
		pool: 'forks',
	},
});
