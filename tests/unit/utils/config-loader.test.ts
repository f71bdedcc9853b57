import { describe, it, expect } from 'vitest';
import { loadEngineConfig, validateEngineConfig } from '../../../src/utils/config-loader.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../src/types/config.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('loadEngineConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadEngineConfig({}, {}, {})).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should apply CLI > environment > config file precedence', () => {
    const config = loadEngineConfig(
      { maxRecords: 50 },
      { maxRecords: 500, sqlDialect: 'ansi', defaultFormat: 'csv', assumedReferentCount: 20 },
      { MOCKSMITH_MAX_RECORDS: '200', MOCKSMITH_SQL_DIALECT: 'mysql' },
    );

    expect(config.maxRecords).toBe(50);
    expect(config.sqlDialect).toBe('mysql');
    expect(config.defaultFormat).toBe('csv');
    expect(config.assumedReferentCount).toBe(20);
  });

  it('should read the environment when the CLI is silent', () => {
    const config = loadEngineConfig({}, { maxRecords: 500 }, {
      MOCKSMITH_MAX_RECORDS: '200',
      MOCKSMITH_DEFAULT_FORMAT: 'JSON',
      MOCKSMITH_LOG_LEVEL: 'debug',
    });

    expect(config.maxRecords).toBe(200);
    expect(config.defaultFormat).toBe('json');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject a non-integer environment value', () => {
    expect(() => loadEngineConfig({}, {}, { MOCKSMITH_MAX_RECORDS: 'lots' })).toThrow(ConfigError);
  });

  it('should reject an unknown format, dialect or log level', () => {
    expect(() => loadEngineConfig({ format: 'xml' }, {}, {})).toThrow(ConfigError);
    expect(() => loadEngineConfig({ dialect: 'oracle' }, {}, {})).toThrow(ConfigError);
    expect(() => loadEngineConfig({ logLevel: 'loud' }, {}, {})).toThrow(ConfigError);
  });
});

describe('validateEngineConfig', () => {
  const valid = { ...DEFAULT_ENGINE_CONFIG };

  it('should accept the defaults', () => {
    expect(validateEngineConfig(valid)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should reject a zero ceiling', () => {
    expect(() => validateEngineConfig({ ...valid, maxRecords: 0 })).toThrow('maxRecords must be a positive integer');
  });

  it('should allow a zero default count', () => {
    expect(validateEngineConfig({ ...valid, defaultCount: 0 }).defaultCount).toBe(0);
  });

  it('should reject a default count above the ceiling', () => {
    expect(() => validateEngineConfig({ ...valid, maxRecords: 5, defaultCount: 10 })).toThrow(
      'defaultCount (10) exceeds maxRecords (5)',
    );
  });

  it('should reject values of the wrong type', () => {
    expect(() => validateEngineConfig({ ...valid, maxRecords: '100' })).toThrow(ConfigError);
  });
});
