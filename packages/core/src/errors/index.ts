/**
 * Custom Error Classes
 */

/**
 * Base error class for all torrent-relay errors
 */
export class RelayError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RelayError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The configured daemon address is not an absolute http(s) URL
 */
export class InvalidEndpointError extends RelayError {
  constructor(endpoint: string, cause?: unknown) {
    super(
      `Invalid daemon endpoint: ${endpoint}`,
      'INVALID_ENDPOINT',
      { endpoint },
      { cause }
    );
    this.name = 'InvalidEndpointError';
  }
}

/**
 * Login was refused, or the daemon could not be reached while logging in
 */
export class AuthenticationFailedError extends RelayError {
  constructor(reason: string, status?: number, cause?: unknown) {
    super(
      `qBittorrent authentication failed: ${reason}`,
      'AUTHENTICATION_FAILED',
      { reason, status },
      { cause }
    );
    this.name = 'AuthenticationFailedError';
  }
}

/**
 * The add-torrent call did not answer with a success status and `Ok.`
 */
export class SubmissionRejectedError extends RelayError {
  public readonly status?: number;
  public readonly responseText?: string;

  constructor(reason: string, status?: number, responseText?: string, cause?: unknown) {
    super(
      `qBittorrent rejected torrent: ${reason}`,
      'SUBMISSION_REJECTED',
      { reason, status, responseText: responseText?.substring(0, 1000) },
      { cause }
    );
    this.name = 'SubmissionRejectedError';
    this.status = status;
    this.responseText = responseText;
  }
}

/**
 * Any other daemon call that did not succeed
 */
export class DaemonRequestError extends RelayError {
  constructor(endpoint: string, status?: number, cause?: unknown) {
    super(
      status === undefined
        ? `qBittorrent request to ${endpoint} failed`
        : `qBittorrent request to ${endpoint} failed with status ${status}`,
      'DAEMON_REQUEST_FAILED',
      { endpoint, status },
      { cause }
    );
    this.name = 'DaemonRequestError';
  }
}

/**
 * Attachment bytes could not be retrieved from the chat provider
 */
export class FileFetchError extends RelayError {
  constructor(fileId: string, reason: string, cause?: unknown) {
    super(
      `Failed to fetch file ${fileId}: ${reason}`,
      'FETCH_ERROR',
      { fileId, reason },
      { cause }
    );
    this.name = 'FileFetchError';
  }
}

/**
 * Missing or invalid settings, including failed endpoint discovery
 */
export class ConfigurationError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}
