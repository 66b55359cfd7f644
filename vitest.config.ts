import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['tests/**/*.test.ts', 'parley-cli/tests/**/*.test.ts'],
		environment: 'node',
	},
});
