export type LogLevel = "info" | "warn" | "error";

export type LogArea = "reconciler" | "log" | "runtime" | "uploads" | "session" | "telemetry";

export const log = (
  level: LogLevel,
  area: LogArea,
  event: string,
  payload: Record<string, unknown> = {},
): void => {
  const line = `[threadline][${area}] ${JSON.stringify({ event, ...payload })}`;
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  console.info(line);
};
