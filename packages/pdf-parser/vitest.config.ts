import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src/index';

const baseConfig = defineBaseConfig({ test: { name: 'pdf-parser' } });

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    coverage: {
      ...baseConfig.test?.coverage,
      exclude: [
        'src/index.ts',
        'src/types/**', // Structural pdf.js types only
        'src/testing/**', // Fake pdf.js documents for tests
      ],
    },
  },
});
