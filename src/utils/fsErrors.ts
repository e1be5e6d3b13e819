export const errorCode = (err: unknown): string | undefined =>
  err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;

export const isMissingFile = (err: unknown): boolean => errorCode(err) === "ENOENT";
