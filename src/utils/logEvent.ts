export type LogFields = Record<string, unknown>;

export function formatEvent(event: string, fields: LogFields = {}): string {
  return JSON.stringify({ event, ...fields });
}

export function logEvent(event: string, fields: LogFields = {}): void {
  console.log(formatEvent(event, fields));
}

export function logErrorEvent(
  event: string,
  error: unknown,
  fields: LogFields = {},
): void {
  console.error(
    formatEvent(event, {
      ...fields,
      error: error instanceof Error ? error.message : "Unknown error",
    }),
  );
}
