import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOSTFOUND_DB_PATH: ':memory:',
      BCRYPT_ROUNDS: '4'
    }
  }
});
