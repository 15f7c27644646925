import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['nodes/**/tests/**/*.test.ts'],
		environment: 'node',
	},
});
