import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    dir: 'src',
    environment: 'node',
    include: ['**/*.spec.ts'],
    // Defaults for env/index.ts must exist before any module under test imports it
    setupFiles: ['./src/tests/setup-env.ts'],
  },
})
