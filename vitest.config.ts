import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['packages/*/src/**/*.spec.ts'],
		testTimeout: 30000,
		coverage: {
			provider: 'v8',
			exclude: ['**/dist/**', '**/node_modules/**', '**/*.d.ts'],
			include: ['packages/*/src/**/*.ts'],
		},
	},
});
