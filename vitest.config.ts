import { defineConfig } from 'vitest/config';

// 测试固定跑在非 UTC 时区：日期结果不能依赖宿主 TZ
process.env.TZ = 'America/New_York';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['test/setup.ts'],
  },
});
