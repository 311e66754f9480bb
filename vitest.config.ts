import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['src/**/*.test.ts'],
        env: {
            LOG_LEVEL: 'error',
            QUAKE_TIME_ZONE: 'UTC'
        },
        server: {
            deps: {
                inline: ['echarts', 'zrender']
            }
        }
    },
});
