import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*_test.ts'],
    exclude: ['node_modules', 'dist'],
    // Pin the environment so detection does not depend on the host terminal
    env: {
      TERMSCROLL_LOG_FILE: '',
      TERMSCROLL_THEME: 'bw-dark',
      TERMSCROLL_UNICODE: 'full',
      TERMSCROLL_CONFIG_FILE: '/nonexistent/termscroll-test-config.json',
    },
  },
});
