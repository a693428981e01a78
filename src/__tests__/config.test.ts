import { describe, it, expect } from 'vitest';
import { loadSubmissionConfig } from '../config.js';
import { ConfigurationError } from '../utils/errors.js';

describe('loadSubmissionConfig', () => {
  it('should fill in defaults', () => {
    expect(loadSubmissionConfig({ baseUrl: 'https://analytics.example.test' })).toEqual({
      baseUrl: 'https://analytics.example.test',
      timeout: 30000,
      headers: {},
      dryRun: false,
      signpostCategory: 'Metrics',
      debug: false
    });
  });

  it('should keep supplied values', () => {
    const config = loadSubmissionConfig({
      baseUrl: 'https://analytics.example.test/api',
      timeout: 5000,
      headers: { 'User-Agent': 'app/3.0' },
      dryRun: true,
      signpostCategory: 'App',
      debug: true,
      logDirectory: '/tmp/metrics-logs'
    });

    expect(config.timeout).toBe(5000);
    expect(config.headers).toEqual({ 'User-Agent': 'app/3.0' });
    expect(config.dryRun).toBe(true);
    expect(config.signpostCategory).toBe('App');
    expect(config.logDirectory).toBe('/tmp/metrics-logs');
  });

  it('should list every invalid option', () => {
    expect(() => loadSubmissionConfig({ baseUrl: 'nope', timeout: -1 })).toThrow(
      'Invalid submission config: baseUrl: Invalid url; timeout: Number must be greater than 0'
    );
  });

  it('should reject a missing base URL', () => {
    expect(() => loadSubmissionConfig({})).toThrow(ConfigurationError);
    expect(() => loadSubmissionConfig({})).toThrow('baseUrl: Required');
  });

  it('should reject non-object input', () => {
    expect(() => loadSubmissionConfig(null)).toThrow('(root): Expected object, received null');
  });
});
