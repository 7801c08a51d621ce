import type { BrowserHost } from "./browser-host.js";
import { toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

// One writer (page script) and one reader (this process) per node.
export const STREAM_NODE_ID = "chatgpt-wrapper-conversation-stream-data";
export const EOF_NODE_ID = "chatgpt-wrapper-conversation-stream-data-eof";
export const SESSION_NODE_ID = "chatgpt-wrapper-session-data";
export const CONVERSATION_INFO_NODE_ID = "chatgpt-wrapper-conversation-info-data";

/**
 * Page-side helpers shared by every injected script. `encodePayload` goes through
 * UTF-8 first because `btoa` only accepts Latin-1. `claimNode` makes the calling
 * script the only writer of a node id: older requests still in flight see
 * `owns()` turn false and must not publish.
 */
export const PAGE_HELPERS = `
  function encodePayload(text) {
    return btoa(unescape(encodeURIComponent(text)));
  }
  function dropNode(id) {
    const node = document.getElementById(id);
    if (node) {
      node.remove();
    }
  }
  function claimNode(id) {
    const owners = (window.__bridgeNodeOwners = window.__bridgeNodeOwners || {});
    const ticket = {};
    owners[id] = ticket;
    dropNode(id);
    return function () {
      return owners[id] === ticket;
    };
  }
  function appendNode(id, text) {
    const node = document.createElement("DIV");
    node.id = id;
    if (text !== undefined) {
      node.textContent = text;
    }
    document.body.appendChild(node);
    return node;
  }
`;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function selectorFor(id: string): string {
  return `div#${id}`;
}

export async function hasNode(host: BrowserHost, id: string): Promise<boolean> {
  const nodes = await host.queryDom(selectorFor(id));
  return nodes.length > 0;
}

export async function readNodeHtml(host: BrowserHost, id: string): Promise<string | null> {
  const [node] = await host.queryDom(selectorFor(id));
  return node ? node.innerHtml() : null;
}

export async function readNodeText(host: BrowserHost, id: string): Promise<string | null> {
  const [node] = await host.queryDom(selectorFor(id));
  return node ? node.innerText() : null;
}

export type WaitForNodeOptions<T> = {
  intervalMs: number;
  /** null polls until the node shows up. */
  timeoutMs: number | null;
  /** Returning undefined means "not ready yet", so the node is read again next tick. */
  read: (text: string) => T | undefined;
};

/**
 * Polls until the node exists and `read` accepts its text. Resolves null when
 * the timeout runs out first.
 */
export async function waitForNodeValue<T>(
  host: BrowserHost,
  id: string,
  options: WaitForNodeOptions<T>,
): Promise<T | null> {
  const startedAt = Date.now();
  while (true) {
    const text = await readNodeText(host, id);
    if (text !== null) {
      const value = options.read(text);
      if (value !== undefined) {
        return value;
      }
    }

    if (options.timeoutMs !== null && Date.now() - startedAt >= options.timeoutMs) {
      return null;
    }

    await sleep(options.intervalMs);
  }
}

/**
 * Decodes a mailbox payload. Empty payloads (the node exists but nothing was
 * published yet) decode to null.
 */
export function decodePayload(encoded: string): string | null {
  const bytes = Buffer.from(encoded.trim(), "base64");
  if (bytes.byteLength === 0) {
    return null;
  }

  return bytes.toString("utf8");
}

export async function removeMailbox(host: BrowserHost, logger: Logger): Promise<void> {
  for (const id of [STREAM_NODE_ID, EOF_NODE_ID]) {
    try {
      await host.removeNode(id);
    } catch (error) {
      logger.warn("mailbox", `failed to remove #${id}`, toErrorMessage(error));
    }
  }
}
