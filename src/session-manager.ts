import type { BrowserHost } from "./browser-host.js";
import type { BridgeConfig } from "./config.js";
import {
  CONVERSATION_INFO_NODE_ID,
  PAGE_HELPERS,
  SESSION_NODE_ID,
  waitForNodeValue,
} from "./dom-mailbox.js";
import { SESSION_NOT_USABLE_MESSAGE, toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export type Session = Record<string, unknown>;

export type ConversationInfo = Record<string, unknown> & {
  current_node?: unknown;
};

type SessionManagerConfig = Pick<BridgeConfig, "baseUrl" | "pollIntervalMs" | "sessionWaitTimeoutMs">;

// Characters the conversation endpoint leaves raw in its JSON body.
const JSON_INVALID_CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\n]/g;

export function removeJsonInvalidControlChars(text: string): string {
  return text.replace(JSON_INVALID_CONTROL_CHARS, "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRecord(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Page script for a GET that only publishes on 200; anything else leaves the
 * node absent and the poller waiting. A leftover node is removed before the
 * request goes out, and a response that arrives after a newer request for the
 * same node was issued is dropped.
 */
export function buildPageGetScript(input: {
  url: string;
  nodeId: string;
  headers?: Record<string, string>;
}): string {
  const headerLines = Object.entries(input.headers ?? {})
    .map(([name, value]) => `  xhr.setRequestHeader(${JSON.stringify(name)}, ${JSON.stringify(value)});`)
    .join("\n");

  return `(() => {
  ${PAGE_HELPERS}
  const owns = claimNode(${JSON.stringify(input.nodeId)});
  const xhr = new XMLHttpRequest();
  xhr.open("GET", ${JSON.stringify(input.url)});
${headerLines}
  xhr.onload = function () {
    if (xhr.status === 200 && owns()) {
      appendNode(${JSON.stringify(input.nodeId)}, xhr.responseText);
    }
  };
  xhr.send();
  return true;
})()`;
}

export class SessionManager {
  readonly #host: BrowserHost;
  readonly #config: SessionManagerConfig;
  readonly #logger: Logger;
  #session: Session;

  constructor(host: BrowserHost, config: SessionManagerConfig, logger: Logger) {
    this.#host = host;
    this.#config = config;
    this.#logger = logger;
    this.#session = {};
  }

  get session(): Session {
    return this.#session;
  }

  get accessToken(): string | null {
    const token = this.#session.accessToken;
    return typeof token === "string" && token ? token : null;
  }

  get isEmpty(): boolean {
    return Object.keys(this.#session).length === 0;
  }

  /**
   * Replaces the session with whatever the session endpoint returns inside the
   * page. Never throws; on failure the session is left empty.
   */
  async refreshSession(): Promise<Session> {
    try {
      await this.#host.evaluate(
        buildPageGetScript({
          url: `${this.#config.baseUrl}/api/auth/session`,
          nodeId: SESSION_NODE_ID,
        }),
      );

      const payload = await waitForNodeValue(this.#host, SESSION_NODE_ID, {
        intervalMs: this.#config.pollIntervalMs,
        timeoutMs: this.#config.sessionWaitTimeoutMs,
        read: (text) => {
          const parsed = parseRecord(text);
          if (!parsed) {
            this.#logger.debug("session", "session payload not parseable yet");
          }
          return parsed;
        },
      });

      await this.#host.removeNode(SESSION_NODE_ID);

      if (!payload) {
        this.#logger.warn("session", "timed out waiting for session data");
      }
      this.#session = payload ?? {};
    } catch (error) {
      this.#logger.warn("session", "session refresh failed", toErrorMessage(error));
      this.#session = {};
    }

    return this.#session;
  }

  async ensureSession(): Promise<Session> {
    if (this.isEmpty) {
      await this.refreshSession();
    }

    return this.#session;
  }

  /**
   * Loads a conversation record through the page. Returns null when the
   * session is unusable, the wait ceiling runs out, or the host fails.
   */
  async getConversationInfo(conversationId: string): Promise<ConversationInfo | null> {
    await this.ensureSession();
    const accessToken = this.accessToken;
    if (!accessToken) {
      this.#logger.warn("session", SESSION_NOT_USABLE_MESSAGE);
      return null;
    }

    try {
      await this.#host.evaluate(
        buildPageGetScript({
          url: `${this.#config.baseUrl}/backend-api/conversation/${encodeURIComponent(conversationId)}`,
          nodeId: CONVERSATION_INFO_NODE_ID,
          headers: {
            Accept: "text/event-stream",
            "Content-Type": "application/json",
            Authorization: `Bearer ${accessToken}`,
          },
        }),
      );

      const info = await waitForNodeValue(this.#host, CONVERSATION_INFO_NODE_ID, {
        intervalMs: this.#config.pollIntervalMs,
        timeoutMs: this.#config.sessionWaitTimeoutMs,
        read: (text) => {
          const parsed = parseRecord(removeJsonInvalidControlChars(text));
          if (!parsed) {
            this.#logger.debug("conversation", "conversation info not parseable yet", conversationId);
          }
          return parsed;
        },
      });

      await this.#host.removeNode(CONVERSATION_INFO_NODE_ID);
      return info;
    } catch (error) {
      this.#logger.warn("conversation", `failed to load conversation ${conversationId}`, toErrorMessage(error));
      return null;
    }
  }
}
