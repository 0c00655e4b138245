/**
 * @torrent-relay/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - Cooperative shutdown signal
 */

// Errors
export { 
  RelayError,
  InvalidEndpointError,
  AuthenticationFailedError,
  SubmissionRejectedError,
  DaemonRequestError,
  FileFetchError,
  ConfigurationError,
} from './errors/index.js';

// Shutdown
export { ShutdownSignal } from './shutdown.js';
