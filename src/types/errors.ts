/**
 * The replay bytes could not be decoded into details and events.
 */
export class ReplayParseError extends Error {
  constructor(
    public fileName: string,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'ReplayParseError';
  }
}

/**
 * Reading the uploaded file failed before any bytes were available.
 */
export class ReplayReadError extends Error {
  constructor(
    public fileName: string,
    message: string,
  ) {
    super(message);
    this.name = 'ReplayReadError';
  }
}

export enum RenderCoreErrorCode {
  CONTEXT_UNAVAILABLE = 'CONTEXT_UNAVAILABLE',
  PROGRAM_FAILED = 'PROGRAM_FAILED',
  BUFFER_FAILED = 'BUFFER_FAILED',
  NOT_INITIALIZED = 'NOT_INITIALIZED',
}

/**
 * Render surface failures. These stop the map view only.
 */
export class RenderCoreError extends Error {
  constructor(
    public code: RenderCoreErrorCode,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'RenderCoreError';
  }
}

/**
 * DOMException is not an Error subclass in every runtime, so only the name
 * is checked.
 */
export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
