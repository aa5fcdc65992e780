import { z } from "zod";

const botResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  parameters: z
    .object({ retry_after: z.number().optional() })
    .optional()
});

export class BotApiError extends Error {
  readonly status: number;
  readonly description?: string;
  readonly retryAfterSeconds?: number;

  constructor(
    method: string,
    status: number,
    details: { description?: string; retryAfterSeconds?: number; cause?: unknown } = {}
  ) {
    super(
      `${method} failed: ${details.description ?? `HTTP ${status}`}`,
      { cause: details.cause }
    );
    this.name = "BotApiError";
    this.status = status;
    this.description = details.description;
    this.retryAfterSeconds = details.retryAfterSeconds;
  }

  get rateLimited(): boolean {
    return this.status === 429 || this.retryAfterSeconds !== undefined;
  }
}

export type BotApiClientOptions = {
  apiBase: string;
  token: string;
  chatId: string;
  timeoutMs: number;
};

/**
 * Minimal Bot API client. Telegram and Bale accept the same methods and
 * payloads, so one client serves both.
 */
export class BotApiClient {
  private readonly baseUrl: string;

  constructor(private readonly options: BotApiClientOptions) {
    this.baseUrl = `${options.apiBase.replace(/\/+$/, "")}/bot${options.token}`;
  }

  async sendMessage(text: string, signal?: AbortSignal): Promise<void> {
    await this.call(
      "sendMessage",
      {
        chat_id: this.options.chatId,
        text,
        parse_mode: "HTML",
        disable_notification: true,
        link_preview_options: { is_disabled: true }
      },
      signal
    );
  }

  async sendPhoto(photo: string, caption: string, signal?: AbortSignal): Promise<void> {
    await this.call(
      "sendPhoto",
      {
        chat_id: this.options.chatId,
        photo,
        caption,
        parse_mode: "HTML",
        disable_notification: true
      },
      signal
    );
  }

  /** The caption rides on the first photo of the album. */
  async sendMediaGroup(
    photos: readonly string[],
    caption: string,
    signal?: AbortSignal
  ): Promise<void> {
    const media = photos.map((url, index) =>
      index === 0
        ? { type: "photo", media: url, caption, parse_mode: "HTML" }
        : { type: "photo", media: url }
    );

    await this.call(
      "sendMediaGroup",
      {
        chat_id: this.options.chatId,
        media,
        disable_notification: true
      },
      signal
    );
  }

  private async call(
    method: string,
    payload: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/${method}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
    } catch (error) {
      throw new BotApiError(method, 0, {
        description: controller.signal.aborted
          ? "request aborted"
          : error instanceof Error
            ? error.message
            : "connection failed",
        cause: error
      });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }

    const body = botResponseSchema.safeParse(
      await response.json().catch(() => null)
    );

    if (response.ok && body.success && body.data.ok) {
      return;
    }

    throw new BotApiError(method, response.status, {
      description: body.success ? body.data.description : undefined,
      retryAfterSeconds: body.success
        ? body.data.parameters?.retry_after
        : undefined
    });
  }
}
