/**
 * Outbound HTTP client that POSTs a scheduled payload to its webhook. One
 * attempt per call; failures are reported, never retried here.
 */
import { DeliveryFailedError, errorMessage } from "./scheduling/errors.js";

const DEFAULT_HEADERS = { "Content-Type": "application/json" };

export interface WebhookClientOptions {
  timeoutMs: number;
  /** Injected for tests; defaults to global fetch. */
  fetch?: typeof fetch;
}

export interface WebhookClient {
  /** Resolves on a 2xx response; rejects with DeliveryFailedError otherwise. */
  deliver(url: string, payload: Record<string, unknown>): Promise<void>;
}

export function createWebhookClient(
  options: WebhookClientOptions,
): WebhookClient {
  const { timeoutMs } = options;
  const doFetch = options.fetch ?? fetch;

  return {
    async deliver(
      url: string,
      payload: Record<string, unknown>,
    ): Promise<void> {
      let res: Response;
      try {
        res = await doFetch(url, {
          method: "POST",
          headers: DEFAULT_HEADERS,
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        throw new DeliveryFailedError(url, errorMessage(err));
      }
      if (!res.ok) {
        const text = await res.text().catch(() => "");
        throw new DeliveryFailedError(
          url,
          `${res.status} ${text}`.trim(),
          res.status,
        );
      }
      // the reply is not used; release the connection
      await res.body?.cancel();
    },
  };
}
