/**
 * Helpers for reading Node and @effect/platform I/O errors.
 *
 * A PlatformError is a plain tagged struct, not an `Error`, and carries no
 * `code`. Its `message` starts with the errno name ("EXDEV: cross-device link
 * not permitted, rename"), so the code is read from there when there is no
 * `code` field.
 */

const ERRNO_PREFIX = /^(E[A-Z]+)\b/;

const messageOf = (error: object): string | undefined =>
  "message" in error && typeof error.message === "string" ? error.message : undefined;

export const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code.toUpperCase();
  if ("cause" in error && error.cause !== undefined) return errorCode(error.cause);
  return messageOf(error)?.match(ERRNO_PREFIX)?.[1];
};

export const errorMessage = (error: unknown): string => {
  if (typeof error === "object" && error !== null) {
    const message = messageOf(error);
    if (message !== undefined && message.length > 0) return message;
    if ("_tag" in error && typeof error._tag === "string") {
      return "reason" in error && typeof error.reason === "string"
        ? `${error._tag}: ${error.reason}`
        : error._tag;
    }
  }
  return String(error);
};

export const isPermissionError = (error: unknown): boolean => {
  const code = errorCode(error);
  if (code === "EACCES" || code === "EPERM") return true;

  const message = errorMessage(error).toLowerCase();
  return (
    message.includes("eacces") ||
    message.includes("eperm") ||
    message.includes("permission denied") ||
    message.includes("operation not permitted")
  );
};

export const isCrossDevice = (error: unknown): boolean =>
  errorCode(error) === "EXDEV" || errorMessage(error).toLowerCase().includes("exdev");
