import { errorMessage, type SessionEvent } from "@threadline/sdk";
import { log } from "./log.js";

export type TelemetrySink = (event: SessionEvent) => Promise<void> | void;

/** Session events go nowhere unless one of these is set. */
export interface TelemetryConfig {
  /** false drops every event, whatever else is configured. */
  enabled?: boolean;
  /** OTLP/HTTP logs endpoint, e.g. http://localhost:4318/v1/logs */
  otlp?: string;
  /** Mirror events as `[threadline][telemetry]` log lines. */
  log?: boolean;
  handler?: TelemetrySink;
}

type Severity = "INFO" | "WARN";

type OtlpValue = { stringValue: string } | { intValue: string } | { doubleValue: number };

const severityOf = (event: SessionEvent): Severity => (event.type === "turn:failed" ? "WARN" : "INFO");

const toOtlpValue = (value: unknown): OtlpValue => {
  if (typeof value === "number") {
    return Number.isInteger(value) ? { intValue: String(value) } : { doubleValue: value };
  }
  if (typeof value === "string") {
    return { stringValue: value };
  }
  return { stringValue: JSON.stringify(value) };
};

const eventFields = (event: SessionEvent): Array<[string, unknown]> =>
  Object.entries(event).filter(([key]) => key !== "type");

/** One OTLP log record per session event; the event type is the body. */
export const toOtlpLogRecord = (event: SessionEvent, now: number = Date.now()) => ({
  timeUnixNano: `${now}000000`,
  severityText: severityOf(event),
  body: { stringValue: event.type },
  attributes: eventFields(event).map(([key, value]) => ({
    key: `threadline.${key}`,
    value: toOtlpValue(value),
  })),
});

const otlpSink =
  (endpoint: string): TelemetrySink =>
  async (event) => {
    const body = {
      resourceLogs: [
        {
          resource: { attributes: [{ key: "service.name", value: { stringValue: "threadline" } }] },
          scopeLogs: [{ scope: { name: "threadline.session" }, logRecords: [toOtlpLogRecord(event)] }],
        },
      ],
    };
    try {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
      if (!response.ok) {
        log("warn", "telemetry", "export.rejected", { endpoint, status: response.status });
      }
    } catch (error) {
      log("warn", "telemetry", "export.failed", { endpoint, message: errorMessage(error) });
    }
  };

const logSink: TelemetrySink = (event) => {
  const level = severityOf(event) === "WARN" ? "warn" : "info";
  log(level, "telemetry", event.type, Object.fromEntries(eventFields(event)));
};

/** Fans session lifecycle events out to the configured sinks, in order. */
export class TelemetryEmitter {
  private readonly sinks: TelemetrySink[];

  constructor(config: TelemetryConfig = {}) {
    this.sinks = [];
    if (config.enabled === false) {
      return;
    }
    if (config.handler) {
      this.sinks.push(config.handler);
    }
    if (config.otlp) {
      this.sinks.push(otlpSink(config.otlp));
    }
    if (config.log) {
      this.sinks.push(logSink);
    }
  }

  async emit(event: SessionEvent): Promise<void> {
    for (const sink of this.sinks) {
      await sink(event);
    }
  }
}
