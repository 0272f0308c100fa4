import * as os from 'os';
import * as path from 'path';
import { defineConfig } from 'vitest/config';

const sandbox = path.join(os.tmpdir(), 'lead-resolver-test');

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      DATA_DIR: path.join(sandbox, 'data'),
      CONFIG_DIR: path.join(sandbox, 'config'),
      LOG_DIR: path.join(sandbox, 'logs'),
      DB_PATH: ':memory:',
      LOG_LEVEL: 'error',
      HUBSPOT_TOKEN: 'test-token',
    },
  },
});
