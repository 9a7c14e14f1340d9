import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConnectionError,
  RegistrationError,
  WriteError,
  formatError,
  isGraphiteError,
  isRetryableError,
  toError,
} from '../index';

describe('errors', () => {
  it('should classify transport failures as retryable', () => {
    expect(isRetryableError(ConnectionError.timedOut('localhost', 2003, 500))).toBe(true);
    expect(isRetryableError(new WriteError('Connection is closed'))).toBe(true);
    expect(isRetryableError(new ConfigurationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should keep the dial cause and address on connection errors', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:2003');
    const error = ConnectionError.refused('127.0.0.1', 2003, cause);

    expect(error.message).toBe(
      'Unable to connect to 127.0.0.1:2003: connect ECONNREFUSED 127.0.0.1:2003'
    );
    expect(error.cause).toBe(cause);
    expect(error.host).toBe('127.0.0.1');
    expect(error.port).toBe(2003);
    expect(isGraphiteError(error)).toBe(true);
  });

  it('should describe timeouts', () => {
    expect(ConnectionError.timedOut('graphite', 2003, 250).message).toBe(
      'Connection to graphite:2003 timed out after 250ms'
    );
  });

  it('should carry the metric name on registration errors', () => {
    const error = new RegistrationError('Metric already registered: jobs', 'jobs');
    expect(error.metricName).toBe('jobs');
    expect(error.category).toBe('registration');
  });

  it('should format errors for log context', () => {
    expect(formatError(new ConfigurationError('Host is required'))).toBe(
      '[CONFIGURATION] ConfigurationError: Host is required'
    );
    expect(formatError(new TypeError('nope'))).toBe('TypeError: nope');
    expect(formatError('plain')).toBe('plain');
  });

  it('should normalize thrown values', () => {
    const error = new Error('kept');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});
