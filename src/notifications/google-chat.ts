import { NotificationDeliveryError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ChatCard } from "./chat-card.js";

export interface GoogleChatOptions {
  enabled: boolean;
  webhookUrl: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * POST a card to a Google Chat incoming webhook.
 *
 * @returns false when chat delivery is disabled or has no URL, true once delivered.
 * @throws {NotificationDeliveryError} on a non-2xx response, timeout or network error.
 */
export async function sendChatCard(
  options: GoogleChatOptions | undefined,
  card: ChatCard,
): Promise<boolean> {
  if (!options?.enabled || !options.webhookUrl) return false;

  const log = logger.child({ component: "google-chat" });
  let res: Response;
  try {
    res = await fetch(options.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json; charset=UTF-8" },
      body: JSON.stringify(card),
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (err: unknown) {
    throw new NotificationDeliveryError("chat", `webhook request failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    throw new NotificationDeliveryError("chat", `webhook returned HTTP ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`);
  }
  log.info("card sent to Google Chat");
  return true;
}
