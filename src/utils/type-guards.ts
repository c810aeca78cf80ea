/**
 * Runtime type guard that checks if a value is a non-null object.
 * Lets provider payloads and thrown values be read without casts.
 */
export function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
