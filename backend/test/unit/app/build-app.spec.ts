import { describe, it, expect } from 'vitest';
import { logger } from '../../../src/shared/logger/logger';
import { buildTestApp } from '../../helpers/build-test-app';

describe('buildApp', () => {
  it('configures the logger from the app config', async () => {
    const { close } = await buildTestApp({ config: { logLevel: 'warn', serviceName: 'directory-a' } });

    try {
      expect(logger.level).toBe('warn');
      expect(logger.defaultMeta).toEqual({ service: 'directory-a', env: 'test' });
    } finally {
      await close();
    }
  });
});
