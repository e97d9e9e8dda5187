export function hasErrnoCode(
  error: unknown,
  code: string
): error is NodeJS.ErrnoException {
  return (
    error instanceof Error && "code" in error && error.code === code
  );
}

export function isEnoent(error: unknown): error is NodeJS.ErrnoException {
  return hasErrnoCode(error, "ENOENT");
}
