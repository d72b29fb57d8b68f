import { Environment, validate } from './env.validation';

describe('validate (environment)', () => {
  it('should apply defaults for an empty environment', () => {
    const config = validate({});

    expect(config.NODE_ENV).toBe(Environment.Development);
    expect(config.PORT).toBe(8000);
    expect(config.HOST).toBe('0.0.0.0');
    expect(config.LOG_LEVEL).toBe('log');
    expect(config.RATE_LIMIT_TTL).toBe(60);
    expect(config.RATE_LIMIT_MAX).toBe(100);
  });

  it('should parse numeric strings', () => {
    const config = validate({ PORT: '3001', RATE_LIMIT_TTL: '30', RATE_LIMIT_MAX: '5' });

    expect(config.PORT).toBe(3001);
    expect(config.RATE_LIMIT_TTL).toBe(30);
    expect(config.RATE_LIMIT_MAX).toBe(5);
  });

  it('should accept a known log level', () => {
    expect(validate({ LOG_LEVEL: 'debug' }).LOG_LEVEL).toBe('debug');
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => validate({ NODE_ENV: 'staging' })).toThrow('Environment validation failed:\nNODE_ENV:');
  });

  it('should reject a non-numeric port', () => {
    expect(() => validate({ PORT: 'abc' })).toThrow(/PORT: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => validate({ LOG_LEVEL: 'trace' })).toThrow(/LOG_LEVEL: /);
  });
});
