import process from "node:process";

/** Environment map accepted by the configuration readers. */
export type ProcessEnv = typeof process.env;

/** Error shape emitted by the filesystem and networking primitives. */
export type ErrnoException = NodeJS.ErrnoException;

/** Narrows unknown failures to errno-flavoured errors carrying a `code`. */
export function isErrnoException(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/** Returns the errno `code` of {@link error} when it exposes one. */
export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}
