export type LoaderErrorCode = 'DIRECTORY_NOT_FOUND' | 'INVALID_CONFIG';

/** Startup errors that stop a run before anything is written. */
export class LoaderError extends Error {
  readonly code: LoaderErrorCode;
  readonly details?: unknown;

  constructor(code: LoaderErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'LoaderError';
    this.code = code;
    this.details = details;
  }
}

export function directoryNotFound(directory: string): LoaderError {
  return new LoaderError('DIRECTORY_NOT_FOUND', `CSV directory not found: ${directory}`);
}

export function invalidConfig(message: string, details?: unknown): LoaderError {
  return new LoaderError('INVALID_CONFIG', message, details);
}

export function isLoaderError(error: unknown): error is LoaderError {
  return error instanceof LoaderError;
}
