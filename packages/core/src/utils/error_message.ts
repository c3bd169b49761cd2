/**
 * Message of an unknown thrown value. Errors raised inside a VM context are
 * not `instanceof Error` in the host realm, so the check is structural.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
