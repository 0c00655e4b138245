import { describe, it, expect } from 'vitest';
import {
  AuthenticationFailedError,
  ConfigurationError,
  InvalidEndpointError,
  RelayError,
  SubmissionRejectedError,
} from './index.js';

describe('error taxonomy', () => {
  it('should carry code and name for each error', () => {
    const errors = [
      [new InvalidEndpointError('nope'), 'INVALID_ENDPOINT', 'InvalidEndpointError'],
      [new AuthenticationFailedError('status 403', 403), 'AUTHENTICATION_FAILED', 'AuthenticationFailedError'],
      [new SubmissionRejectedError('status 500', 500), 'SUBMISSION_REJECTED', 'SubmissionRejectedError'],
      [new ConfigurationError('missing token'), 'CONFIGURATION_ERROR', 'ConfigurationError'],
    ] as const;

    for (const [error, code, name] of errors) {
      expect(error).toBeInstanceOf(RelayError);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it('should keep the underlying cause', () => {
    const cause = new TypeError('fetch failed');

    expect(new AuthenticationFailedError('daemon unreachable', undefined, cause).cause).toBe(cause);
  });

  it('should truncate long response bodies in details', () => {
    const error = new SubmissionRejectedError('unexpected body', 200, 'x'.repeat(1500));

    expect(error.responseText).toHaveLength(1500);
    expect(error.details?.['responseText']).toBe('x'.repeat(1000));
  });
});
