import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      MONGO_URI: 'mongodb://localhost:27017/test',
      // "test-field-encryption-key-32byte"
      FIELD_ENCRYPTION_KEY_BASE64: 'dGVzdC1maWVsZC1lbmNyeXB0aW9uLWtleS0zMmJ5dGU=',
      // "test-blind-index-key-for-hmac-sha512-lookups-only"
      BLIND_INDEX_KEY_BASE64: 'dGVzdC1ibGluZC1pbmRleC1rZXktZm9yLWhtYWMtc2hhNTEyLWxvb2t1cHMtb25seQ=='
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
      ],
    },
    include: ['tests/**/*.{test,spec}.ts'],
  },
});
