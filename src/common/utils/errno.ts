export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const hasErrorCode = (error: unknown, code: string): boolean =>
  isErrnoException(error) && error.code === code;
