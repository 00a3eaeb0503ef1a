import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      LOG_LEVEL: 'silent',
      COINGECKO_CACHE_TTL_SEC: '60',
      NEWS_FEEDS: 'https://feeds.test/one.xml,https://feeds.test/two.xml',
    },
  },
});
