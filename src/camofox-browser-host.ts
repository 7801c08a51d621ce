import { z } from "zod";

import {
  createHostResponse,
  withQuery,
  type BrowserHost,
  type DomNode,
  type HostRequestOptions,
  type HostResponse,
  type HttpMethod,
} from "./browser-host.js";
import type { BridgeConfig } from "./config.js";
import { sleep } from "./dom-mailbox.js";
import { BrowserHostError, toErrorMessage } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";

export type CamofoxBrowserHostOptions = Pick<
  BridgeConfig,
  "baseUrl" | "browserBaseUrl" | "browserUserId" | "browserSessionKey" | "browserApiKey" | "sessionToken"
> & {
  logger?: Logger;
  navigateWaitMs?: number;
};

const SESSION_COOKIE_NAME = "__Secure-next-auth.session-token";
const RECOVERABLE_BROWSER_ERROR =
  /Page crashed|browser.*closed|Target page, context or browser has been closed|Failed to launch the browser process|browserType\.launch/i;

const evaluateResponseSchema = z.object({ result: z.unknown().optional() });
const createTabResponseSchema = z.object({ tabId: z.string().optional() });
const domNodesSchema = z.array(z.object({ text: z.string(), html: z.string() }));
const pageResponseSchema = z.object({
  ok: z.boolean(),
  status: z.number(),
  statusText: z.string(),
  headers: z.record(z.string()),
  text: z.string(),
});

function safeJsonParse(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function summarizeErrorPayload(raw: string): string {
  const parsed = safeJsonParse(raw);
  if (parsed && typeof parsed === "object") {
    for (const key of ["detail", "message", "error"]) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === "string" && value) {
        return value;
      }
    }
  }

  return raw.replace(/\s+/g, " ").trim().slice(0, 300);
}

function domSnapshotScript(selector: string): string {
  return `Array.from(document.querySelectorAll(${JSON.stringify(selector)})).map((node) => ({
  text: node instanceof HTMLElement ? node.innerText : node.textContent || "",
  html: node.innerHTML,
}))`;
}

function removeNodeScript(id: string): string {
  return `(() => {
  const node = document.getElementById(${JSON.stringify(id)});
  if (node) {
    node.remove();
  }
  return true;
})()`;
}

function pageFetchScript(method: HttpMethod, url: string, options: HostRequestOptions): string {
  const init = {
    method,
    credentials: "include",
    headers: {
      Accept: "application/json",
      ...(options.body !== undefined ? { "Content-Type": "application/json" } : {}),
      ...options.headers,
    },
    ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
  };

  return `(async () => {
  const response = await fetch(${JSON.stringify(withQuery(url, options.params))}, ${JSON.stringify(init)});
  const headers = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return {
    ok: response.ok,
    status: response.status,
    statusText: response.statusText,
    headers,
    text: await response.text(),
  };
})()`;
}

/**
 * BrowserHost backed by a camofox browser server. One tab is created lazily
 * and reused for every call, so scripts and DOM reads share a page.
 */
export class CamofoxBrowserHost implements BrowserHost {
  readonly #options: CamofoxBrowserHostOptions;
  readonly #logger: Logger;
  #tabId: string | null;

  constructor(options: CamofoxBrowserHostOptions) {
    this.#options = options;
    this.#logger = options.logger ?? silentLogger;
    this.#tabId = null;
  }

  async navigate(url: string): Promise<void> {
    const tabId = await this.#ensureTab();
    await this.#post(`/tabs/${encodeURIComponent(tabId)}/navigate`, {
      userId: this.#options.browserUserId,
      url,
    });

    try {
      await this.#post(`/tabs/${encodeURIComponent(tabId)}/wait`, {
        userId: this.#options.browserUserId,
        timeout: this.#options.navigateWaitMs ?? 15000,
        waitForNetwork: true,
      });
    } catch (error) {
      // the chat page keeps long-lived connections open, so network idle may never come
      this.#logger.debug("camofox", "wait after navigate did not settle", toErrorMessage(error));
    }
  }

  async evaluate(script: string): Promise<unknown> {
    const tabId = await this.#ensureTab();
    const payload = await this.#post(`/tabs/${encodeURIComponent(tabId)}/evaluate`, {
      userId: this.#options.browserUserId,
      expression: script,
    });

    const parsed = evaluateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new BrowserHostError("camofox_invalid_evaluate_response");
    }

    return parsed.data.result;
  }

  async queryDom(selector: string): Promise<DomNode[]> {
    const result = await this.evaluate(domSnapshotScript(selector));
    const parsed = domNodesSchema.safeParse(result);
    if (!parsed.success) {
      throw new BrowserHostError("camofox_invalid_dom_snapshot", selector);
    }

    return parsed.data.map((node) => ({
      innerText: () => node.text,
      innerHtml: () => node.html,
    }));
  }

  async removeNode(id: string): Promise<void> {
    await this.evaluate(removeNodeScript(id));
  }

  async httpRequest(method: HttpMethod, url: string, options: HostRequestOptions = {}): Promise<HostResponse> {
    const result = await this.evaluate(pageFetchScript(method, url, options));
    const parsed = pageResponseSchema.safeParse(result);
    if (!parsed.success) {
      throw new BrowserHostError("camofox_invalid_page_response", `${method} ${url}`);
    }

    return createHostResponse(parsed.data);
  }

  async close(): Promise<void> {
    const tabId = this.#tabId;
    this.#tabId = null;
    if (!tabId) {
      return;
    }

    try {
      await this.#request(`/tabs/${encodeURIComponent(tabId)}`, {
        method: "DELETE",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ userId: this.#options.browserUserId }),
      });
    } catch (error) {
      this.#logger.warn("camofox", `failed to close tab ${tabId}`, toErrorMessage(error));
    }
  }

  async #ensureTab(): Promise<string> {
    if (this.#tabId) {
      return this.#tabId;
    }

    const tabId = await this.#createTab();
    await this.#importSessionCookie();
    this.#tabId = tabId;
    return tabId;
  }

  async #createTab(): Promise<string> {
    const maxAttempts = 4;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      try {
        const payload = createTabResponseSchema.parse(
          await this.#post("/tabs", {
            userId: this.#options.browserUserId,
            sessionKey: this.#options.browserSessionKey,
            url: "about:blank",
          }),
        );
        const tabId = String(payload.tabId ?? "").trim();
        if (!tabId) {
          throw new BrowserHostError("camofox_create_tab_failed_missing_tab_id");
        }

        return tabId;
      } catch (error) {
        lastError = error;
        const message = toErrorMessage(error);
        if (!RECOVERABLE_BROWSER_ERROR.test(message) || attempt === maxAttempts - 1) {
          throw error;
        }

        this.#logger.warn("camofox", `tab creation failed, restarting browser (attempt ${attempt + 1})`, message);
        await this.#restartBrowser();
        await sleep(1000 * (attempt + 1));
      }
    }

    throw lastError instanceof Error ? lastError : new BrowserHostError("camofox_create_tab_failed");
  }

  async #restartBrowser(): Promise<void> {
    try {
      await fetch(`${this.#options.browserBaseUrl}/start`, { method: "POST" });
    } catch (error) {
      this.#logger.warn("camofox", "browser restart request failed", toErrorMessage(error));
    }
  }

  async #importSessionCookie(): Promise<void> {
    const token = this.#options.sessionToken;
    if (!token) {
      return;
    }

    const domain = new URL(this.#options.baseUrl).hostname;
    const expires = Math.floor(Date.now() / 1000) + 60 * 60 * 24 * 30;
    const headers: Record<string, string> = {};
    if (this.#options.browserApiKey) {
      headers.Authorization = `Bearer ${this.#options.browserApiKey}`;
    }

    await this.#post(
      `/sessions/${encodeURIComponent(this.#options.browserUserId)}/cookies`,
      {
        cookies: [
          {
            name: SESSION_COOKIE_NAME,
            value: token,
            domain,
            path: "/",
            expires,
            httpOnly: true,
            secure: true,
            sameSite: "None",
          },
        ],
      },
      headers,
    );
  }

  async #request(path: string, init: RequestInit = {}): Promise<unknown> {
    const response = await fetch(`${this.#options.browserBaseUrl}${path}`, init);
    const raw = await response.text();

    if (!response.ok) {
      throw new BrowserHostError(
        `camofox_request_failed_${response.status}`,
        summarizeErrorPayload(raw),
        response.status,
      );
    }

    const payload = safeJsonParse(raw);
    if (payload === null) {
      throw new BrowserHostError(`camofox_invalid_json_response_for_${path}`);
    }

    return payload;
  }

  async #post(path: string, body: Record<string, unknown>, headers: Record<string, string> = {}): Promise<unknown> {
    return await this.#request(path, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        ...headers,
      },
      body: JSON.stringify(body),
    });
  }
}
