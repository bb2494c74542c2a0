export type LogLevel = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

/**
 * Writes one JSON line per event. Errors and critical conditions go to stderr.
 */
export const logEvent = (level: LogLevel, event: string, fields: LogFields = {}): void => {
  const line = JSON.stringify({ event, ...fields });
  // eslint-disable-next-line no-console
  if (level === "error") console.error(line);
  // eslint-disable-next-line no-console
  else if (level === "warn") console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
