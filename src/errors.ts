/**
 * Base class for errors raised by the transport itself.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/**
 * The network driver could not be created or started.
 * The only failure that surfaces from configure()/connect().
 */
export class TransportSetupError extends TransportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportSetupError';
  }
}
