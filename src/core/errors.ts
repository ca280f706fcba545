export type ScanErrorCode = 'ROOT_NOT_FOUND' | 'ROOT_NOT_DIRECTORY' | 'ROOT_UNREADABLE';

/**
 * Raised when the scan root cannot be read. The only error that aborts a context request.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly rootPath: string;

  constructor(code: ScanErrorCode, rootPath: string, options?: { cause?: unknown }) {
    super(describe(code, rootPath), options);
    this.name = 'ScanError';
    this.code = code;
    this.rootPath = rootPath;
  }
}

function describe(code: ScanErrorCode, rootPath: string): string {
  switch (code) {
    case 'ROOT_NOT_FOUND':
      return `Path does not exist: ${rootPath}`;
    case 'ROOT_NOT_DIRECTORY':
      return `Path is not a directory: ${rootPath}`;
    case 'ROOT_UNREADABLE':
      return `Cannot read directory: ${rootPath}`;
  }
}

/**
 * Type guard for Node.js errors with code property.
 */
export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
