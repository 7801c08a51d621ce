import crypto from "node:crypto";

import type { BrowserHost, HostRequestOptions, HostResponse, HttpMethod } from "./browser-host.js";
import { resolveConfig, type BridgeConfig } from "./config.js";
import { removeMailbox } from "./dom-mailbox.js";
import {
  READ_FAILURE_MESSAGE,
  SESSION_NOT_USABLE_MESSAGE,
  toErrorMessage,
  UNUSABLE_RESPONSE_MESSAGE,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { renderModelFor } from "./models.js";
import { assembleResponse, type AssemblerOutcome } from "./response-assembler.js";
import { SessionManager, type ConversationInfo, type Session } from "./session-manager.js";
import { buildEnvelope, buildStreamDriverScript } from "./stream-driver.js";

export type ConversationState = {
  conversationId: string | null;
  parentMessageId: string;
  titleSet: boolean;
};

export type ApiResult = {
  ok: boolean;
  json: unknown;
  response: HostResponse | null;
};

export type HistoryItem = Record<string, unknown> & { id: string };

export type ChatgptBridgeOptions = {
  config?: BridgeConfig;
  logger?: Logger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isHistoryItem(value: unknown): value is HistoryItem {
  return isRecord(value) && typeof value.id === "string";
}

export class ChatgptBridge {
  readonly #host: BrowserHost;
  readonly #config: BridgeConfig;
  readonly #logger: Logger;
  readonly #sessions: SessionManager;
  #conversation: ConversationState;
  #lastOutcome: AssemblerOutcome | null;

  constructor(host: BrowserHost, options: ChatgptBridgeOptions = {}) {
    this.#host = host;
    this.#config = options.config ?? resolveConfig();
    this.#logger =
      options.logger ??
      createLogger({ level: this.#config.logLevel, debugLogFile: this.#config.debugLogFile ?? undefined });
    this.#sessions = new SessionManager(host, this.#config, this.#logger);
    this.#conversation = {
      conversationId: null,
      parentMessageId: crypto.randomUUID(),
      titleSet: false,
    };
    this.#lastOutcome = null;
    this.#logger.debug("bridge", "bridge initialized", { model: this.#config.model });
  }

  get config(): BridgeConfig {
    return this.#config;
  }

  get conversation(): Readonly<ConversationState> {
    return { ...this.#conversation };
  }

  get session(): Session {
    return this.#sessions.session;
  }

  /** How the most recent stream ended, for diagnostics. */
  get lastOutcome(): AssemblerOutcome | null {
    return this.#lastOutcome;
  }

  async start(): Promise<void> {
    await this.#host.navigate(`${this.#config.baseUrl}/`);
  }

  async close(): Promise<void> {
    await this.#host.close();
  }

  async refreshSession(): Promise<Session> {
    return await this.#sessions.refreshSession();
  }

  newConversation(): void {
    this.#conversation = {
      conversationId: null,
      parentMessageId: crypto.randomUUID(),
      titleSet: false,
    };
  }

  async switchToConversation(conversationId: string): Promise<ConversationInfo | null> {
    this.#conversation.conversationId = conversationId;
    const info = await this.#sessions.getConversationInfo(conversationId);
    if (info && typeof info.current_node === "string") {
      this.#conversation.parentMessageId = info.current_node;
    }

    return info;
  }

  async ask(message: string): Promise<string> {
    const chunks: string[] = [];
    for await (const chunk of this.askStream(message)) {
      chunks.push(chunk);
    }

    return chunks.length > 0 ? chunks.join("") : UNUSABLE_RESPONSE_MESSAGE;
  }

  /**
   * Sends one conversation turn and yields the answer as it grows. Failures are
   * reported as a yielded message, never thrown. Stopping iteration early still
   * removes the mailbox nodes, but the page-side request keeps running until it
   * ends on its own.
   */
  async *askStream(prompt: string): AsyncGenerator<string, void, void> {
    await this.#sessions.ensureSession();
    const accessToken = this.#sessions.accessToken;
    if (!accessToken) {
      yield SESSION_NOT_USABLE_MESSAGE;
      return;
    }

    const envelope = buildEnvelope({
      prompt,
      model: renderModelFor(this.#config.model),
      conversationId: this.#conversation.conversationId,
      parentMessageId: this.#conversation.parentMessageId,
    });

    this.#lastOutcome = null;
    try {
      try {
        await this.#host.evaluate(
          buildStreamDriverScript({
            url: `${this.#config.baseUrl}/backend-api/conversation`,
            accessToken,
            envelope,
          }),
        );
      } catch (error) {
        this.#logger.warn("bridge", "failed to start conversation stream", toErrorMessage(error));
        this.#lastOutcome = "failed";
        yield READ_FAILURE_MESSAGE;
        return;
      }

      yield* assembleResponse(this.#host, {
        timeoutMs: this.#config.timeoutMs,
        pollIntervalMs: this.#config.pollIntervalMs,
        logger: this.#logger,
        onFrame: (frame) => {
          this.#conversation.parentMessageId = frame.message.id;
          this.#conversation.conversationId = frame.conversation_id;
        },
        onFinish: (outcome) => {
          this.#lastOutcome = outcome;
        },
      });
    } finally {
      await removeMailbox(this.#host, this.#logger);
      void this.setTitle().catch((error: unknown) => {
        this.#logger.warn("title", "title request crashed", toErrorMessage(error));
      });
    }
  }

  async setTitle(): Promise<void> {
    const { conversationId, parentMessageId, titleSet } = this.#conversation;
    if (!conversationId || titleSet) {
      return;
    }

    const result = await this.#apiRequest(
      "POST",
      `${this.#config.baseUrl}/backend-api/conversation/gen_title/${encodeURIComponent(conversationId)}`,
      {
        body: {
          message_id: parentMessageId,
          model: renderModelFor(this.#config.model),
        },
      },
    );

    if (result.ok) {
      if (this.#conversation.conversationId === conversationId) {
        this.#conversation.titleSet = true;
      }
      return;
    }

    this.#logger.warn("title", "Failed to set title");
  }

  async getHistory(limit = 20, offset = 0): Promise<Record<string, HistoryItem> | null> {
    await this.#sessions.ensureSession();
    const result = await this.#apiRequest("GET", `${this.#config.baseUrl}/backend-api/conversations`, {
      params: { offset, limit },
    });

    const items = isRecord(result.json) ? result.json.items : undefined;
    if (!result.ok || !Array.isArray(items)) {
      this.#logger.warn("history", "Failed to get history");
      return null;
    }

    const history: Record<string, HistoryItem> = {};
    for (const item of items) {
      if (isHistoryItem(item)) {
        history[item.id] = item;
      }
    }

    return history;
  }

  async deleteConversation(conversationId?: string): Promise<unknown> {
    await this.#sessions.ensureSession();
    const id = conversationId || this.#conversation.conversationId;
    if (!id) {
      return null;
    }

    const result = await this.#apiRequest(
      "PATCH",
      `${this.#config.baseUrl}/backend-api/conversation/${encodeURIComponent(id)}`,
      { body: { is_visible: false } },
    );

    if (!result.ok) {
      this.#logger.warn("conversation", "Failed to delete conversation", id);
      return null;
    }

    if (id === this.#conversation.conversationId) {
      this.newConversation();
    }

    return result.json;
  }

  async #apiRequest(method: HttpMethod, url: string, options: HostRequestOptions = {}): Promise<ApiResult> {
    const accessToken = this.#sessions.accessToken;
    if (!accessToken) {
      this.#logger.warn("api", `${method} ${url} skipped: session not usable`);
      return { ok: false, json: null, response: null };
    }

    const headers = {
      ...options.headers,
      Authorization: `Bearer ${accessToken}`,
    };

    let response: HostResponse;
    try {
      response = await this.#host.httpRequest(method, url, { ...options, headers });
    } catch (error) {
      this.#logger.warn("api", `${method} ${url} failed`, toErrorMessage(error));
      return { ok: false, json: null, response: null };
    }

    this.#logger.debug("api", `${method} ${url} response, OK: ${response.ok}, TEXT: ${response.text()}`);

    let json: unknown = null;
    if (response.ok) {
      try {
        json = response.json();
      } catch {
        json = null;
      }
    }

    if (!response.ok || !json) {
      this.#logger.debug("api", `${response.status} ${response.statusText}`, response.headers);
    }

    return { ok: response.ok, json, response };
  }
}
