export const isErrnoCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

export const isMissingFile = (error: unknown): boolean =>
  isErrnoCode(error, 'ENOENT');
