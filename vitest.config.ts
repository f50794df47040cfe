import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		// `process.chdir()` is unavailable in worker threads
		pool: 'forks',
		testTimeout: 40_000,
		include: ['test/**/*.ts'],
		exclude: ['**/node_modules/**', 'test/helpers/**']
	}
});
