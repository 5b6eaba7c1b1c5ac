export function isFileSystemError(
  error: unknown,
): error is NodeJS.ErrnoException & { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

export function isMissing(error: unknown): boolean {
  return isFileSystemError(error) && error.code === "ENOENT";
}
