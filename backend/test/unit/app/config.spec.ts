import { describe, it, expect } from 'vitest';
import { buildConfig, describeConfig } from '../../../src/app/config';

const baseEnv = {
  DB_HOST: 'db.internal',
  DB_NAME: 'employees',
  DB_USER: 'app',
  DB_PASSWORD: 'test-secret',
};

describe('buildConfig', () => {
  it('applies defaults for everything optional', () => {
    const config = buildConfig(baseEnv);

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.displayName).toBe('Employee Directory');
    expect(config.slogan).toBe('');
    expect(config.backgroundImageKey).toBeNull();
    expect(config.db).toEqual({
      host: 'db.internal',
      port: 3306,
      name: 'employees',
      user: 'app',
      password: 'test-secret',
      poolSize: 10,
      timeoutMs: 5000,
    });
    expect(config.assets).toEqual({
      bucket: null,
      region: 'us-east-1',
      endpoint: null,
      delivery: 'presigned',
      urlTtlSeconds: 900,
      timeoutMs: 3000,
    });
    expect(config.records.deleteMissing).toBe('not_found');
    expect(config.seed.enabled).toBe(false);
  });

  it('reads presentation and store settings from env', () => {
    const config = buildConfig({
      ...baseEnv,
      DISPLAY_NAME: 'Team A',
      SLOGAN: 'We ship',
      BACKGROUND_IMAGE_KEY: 'backgrounds/team-a.png',
      DB_PORT: '3307',
      ASSET_BUCKET: 'team-assets',
      ASSET_DELIVERY: 'proxy',
      DELETE_MISSING: 'ignore',
      PORT: '9000',
    });

    expect(config.displayName).toBe('Team A');
    expect(config.slogan).toBe('We ship');
    expect(config.backgroundImageKey).toBe('backgrounds/team-a.png');
    expect(config.db.port).toBe(3307);
    expect(config.assets.bucket).toBe('team-assets');
    expect(config.assets.delivery).toBe('proxy');
    expect(config.records.deleteMissing).toBe('ignore');
    expect(config.port).toBe(9000);
  });

  it('treats a blank background key as no background', () => {
    expect(buildConfig({ ...baseEnv, BACKGROUND_IMAGE_KEY: '   ' }).backgroundImageKey).toBeNull();
  });

  it('only enables the seed for the literal string "true"', () => {
    expect(buildConfig({ ...baseEnv, SEED_ON_START: 'false' }).seed.enabled).toBe(false);
    expect(buildConfig({ ...baseEnv, SEED_ON_START: 'true' }).seed.enabled).toBe(true);
  });

  it('rejects missing credentials and unknown policy values', () => {
    const { DB_PASSWORD: _omitted, ...withoutPassword } = baseEnv;

    expect(() => buildConfig(withoutPassword)).toThrow();
    expect(() => buildConfig({ ...baseEnv, DELETE_MISSING: 'sometimes' })).toThrow();
    expect(() => buildConfig({ ...baseEnv, ASSET_DELIVERY: 'signed' })).toThrow();
  });

  it('returns a frozen config', () => {
    const config = buildConfig(baseEnv);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.db)).toBe(true);
    expect(Object.isFrozen(config.assets)).toBe(true);
  });
});

describe('describeConfig', () => {
  it('leaves the database password out', () => {
    const described = describeConfig(buildConfig(baseEnv));

    expect(described.db).toEqual({ host: 'db.internal', port: 3306, name: 'employees', user: 'app' });
    expect(JSON.stringify(described)).not.toContain('test-secret');
  });
});
