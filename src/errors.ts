/** Missing or invalid configuration. Fatal at startup. */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** A data source could not answer a probe (unreachable, query error, bad response). */
export class ProbeFailure extends Error {
  readonly pipeline: string;

  constructor(pipeline: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProbeFailure";
    this.pipeline = pipeline;
  }
}

/** Webhook or SMTP delivery failed. Logged, retried on the next scheduled run. */
export class NotificationDeliveryError extends Error {
  readonly channel: "chat" | "email";

  constructor(channel: "chat" | "email", message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NotificationDeliveryError";
    this.channel = channel;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
