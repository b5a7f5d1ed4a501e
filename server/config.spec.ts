import { AppConfig } from './config';

describe('AppConfig', () => {
  const keys = ['HCERT_PREFIX', 'HCERT_MAX_INPUT_LENGTH', 'LOG_LEVEL'];
  const saved = { ...process.env };

  const configWith = (env: Record<string, string>) => {
    Object.assign(process.env, env);
    return new AppConfig();
  };

  beforeEach(() => {
    keys.forEach(key => delete process.env[key]);
  });

  afterAll(() => {
    keys.forEach(key => delete process.env[key]);
    Object.assign(process.env, saved);
  });

  it('should fall back to the defaults', () => {
    const config = configWith({});

    expect(config.prefix).toBe('HC1:');
    expect(config.maxInputLength).toBe(4296);
    expect(config.logLevel).toBe('info');
  });

  it('should read the environment', () => {
    const config = configWith({
      HCERT_PREFIX: 'TEST1:',
      HCERT_MAX_INPUT_LENGTH: '0',
      LOG_LEVEL: 'silent',
    });

    expect(config.prefix).toBe('TEST1:');
    expect(config.maxInputLength).toBe(0);
    expect(config.logLevel).toBe('silent');
  });

  it('should reject a negative input length limit', () => {
    expect(() => configWith({ HCERT_MAX_INPUT_LENGTH: '-1' })).toThrow(
      'Invalid config [HCERT_MAX_INPUT_LENGTH]: expected a non-negative integer, got -1'
    );
  });

  it('should reject an input length limit that is not a number', () => {
    expect(() => configWith({ HCERT_MAX_INPUT_LENGTH: 'many' })).toThrow();
  });

  it('should reject an unknown log level', () => {
    expect(() => configWith({ LOG_LEVEL: 'verbose' })).toThrow('Invalid config [LOG_LEVEL]');
  });
});
