import os from 'os'
import path from 'path'
import { defineConfig } from 'vitest/config'

const scratchDir = path.join(os.tmpdir(), 'utility-validator-test')

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
      UPLOAD_DIR: path.join(scratchDir, 'uploads'),
      REPORT_DIR: path.join(scratchDir, 'reports'),
      REGULATION_YEAR: '2025'
    }
  }
})
