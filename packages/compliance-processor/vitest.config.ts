import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig({ test: { name: 'compliance-processor' } }),
);
