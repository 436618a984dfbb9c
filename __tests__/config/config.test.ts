import { loadEnv } from '../../src/config';

describe('loadEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = loadEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 3000,
      API_PREFIX: '/api/v1',
      CORS_ORIGIN: ['*'],
      MATCH_THRESHOLD: 90,
      STAGING_ROOT: 'storage/temp',
      UPLOADS_DIR: 'uploads',
      REDIS_ENABLED: false,
      REDIS_PORT: 6379,
    });
  });

  it('should split a comma-separated origin list', () => {
    const env = loadEnv({ CORS_ORIGIN: 'http://a.test, http://b.test,' });

    expect(env.CORS_ORIGIN).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should read boolean flags', () => {
    expect(loadEnv({ REDIS_ENABLED: 'yes' }).REDIS_ENABLED).toBe(true);
    expect(loadEnv({ REDIS_ENABLED: '0' }).REDIS_ENABLED).toBe(false);
  });

  it('should coerce numeric settings', () => {
    const env = loadEnv({ PORT: '8080', MATCH_THRESHOLD: '75' });

    expect(env.PORT).toBe(8080);
    expect(env.MATCH_THRESHOLD).toBe(75);
  });

  it('should reject an out-of-range threshold', () => {
    expect(() => loadEnv({ MATCH_THRESHOLD: '120' })).toThrow(
      /^Invalid environment configuration: MATCH_THRESHOLD: /
    );
  });

  it('should list every invalid variable', () => {
    expect(() => loadEnv({ PORT: 'abc', LOG_LEVEL: 'verbose' })).toThrow(/PORT: .*; LOG_LEVEL: /);
  });
});
