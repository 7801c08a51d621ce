import { describe, expect, it, vi } from "vitest";

import { ChatgptBridge } from "../chatgpt-bridge.js";
import { resolveConfig } from "../config.js";
import { EOF_NODE_ID, STREAM_NODE_ID } from "../dom-mailbox.js";
import { READ_FAILURE_MESSAGE, SESSION_NOT_USABLE_MESSAGE, UNUSABLE_RESPONSE_MESSAGE } from "../errors.js";
import type { Logger } from "../logger.js";
import {
  JsdomBrowserHost,
  respondWithSession,
  sseFrame,
  type HttpCall,
  type HttpReply,
  type ScriptedXhr,
} from "./helpers/jsdom-browser-host.js";

type Route = (xhr: ScriptedXhr) => void;

function spyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function setup(
  options: {
    session?: Record<string, unknown>;
    timeoutMs?: number;
    routes?: Record<string, Route>;
    http?: (call: HttpCall) => HttpReply;
  } = {},
) {
  const host = new JsdomBrowserHost();
  const respondSession = respondWithSession(options.session ?? { accessToken: "test-token" });
  const routes = options.routes ?? { "/backend-api/conversation": streamReply("conv-1") };
  host.onXhr = (xhr) => {
    if (respondSession(xhr)) return;
    routes[new URL(xhr.url).pathname]?.(xhr);
  };
  host.onHttp = options.http ?? (() => ({ status: 200, body: { title: "Greeting" } }));

  const logger = spyLogger();
  const config = resolveConfig({ pollIntervalMs: 5, timeoutMs: options.timeoutMs ?? 1000 }, {});
  const bridge = new ChatgptBridge(host, { config, logger });
  return { host, bridge, logger };
}

// "Hi" right away, "Hi there" and the end of the stream a little later.
function streamReply(conversationId: string): Route {
  return (xhr) => {
    xhr.push(sseFrame({ messageId: "m-1", conversationId, parts: ["Hi"] }));
    setTimeout(() => {
      xhr.push(sseFrame({ messageId: "m-2", conversationId, parts: ["Hi there"] }));
      xhr.push("data: [DONE]\n\n");
      xhr.finish();
    }, 30);
  };
}

async function collect(stream: AsyncGenerator<string, void, void>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return chunks;
}

describe("ChatgptBridge", () => {
  it("opens the chat site and closes the host", async () => {
    const { host, bridge } = setup();

    await bridge.start();
    await bridge.close();

    expect(host.navigations).toEqual(["https://chat.openai.com/"]);
    expect(host.closed).toBe(true);
  });

  it("streams an answer and adopts the conversation ids", async () => {
    const { host, bridge } = setup();
    const startingParent = bridge.conversation.parentMessageId;

    const chunks = await collect(bridge.askStream("hello"));

    expect(chunks).toEqual(["Hi", " there"]);
    expect(bridge.lastOutcome).toBe("completed");
    expect(bridge.conversation).toMatchObject({ conversationId: "conv-1", parentMessageId: "m-2" });
    expect(host.lastXhrTo("/backend-api/conversation").jsonBody()).toMatchObject({
      model: "text-davinci-002-render-sha",
      conversation_id: null,
      parent_message_id: startingParent,
      messages: [{ role: "user", content: { parts: ["hello"] } }],
    });
    expect(host.nodeText(STREAM_NODE_ID)).toBeNull();
    expect(host.nodeText(EOF_NODE_ID)).toBeNull();
  });

  it("requests a title once the first answer is in", async () => {
    const { host, bridge } = setup();

    await collect(bridge.askStream("hello"));

    await vi.waitFor(() => expect(bridge.conversation.titleSet).toBe(true));
    expect(host.httpCalls).toEqual([
      {
        method: "POST",
        url: "https://chat.openai.com/backend-api/conversation/gen_title/conv-1",
        headers: { Authorization: "Bearer test-token" },
        body: { message_id: "m-2", model: "text-davinci-002-render-sha" },
      },
    ]);
  });

  it("continues the conversation from the previous answer", async () => {
    const { host, bridge } = setup();
    await collect(bridge.askStream("hello"));
    await vi.waitFor(() => expect(bridge.conversation.titleSet).toBe(true));

    await collect(bridge.askStream("and again"));

    const requests = host.xhrsTo("/backend-api/conversation");
    expect(requests).toHaveLength(2);
    expect(requests[1]?.jsonBody()).toMatchObject({ conversation_id: "conv-1", parent_message_id: "m-2" });
    expect(host.httpCalls).toHaveLength(1);
  });

  it("reports an unusable session without posting a message", async () => {
    const { host, bridge } = setup({ session: {} });

    expect(await collect(bridge.askStream("hello"))).toEqual([SESSION_NOT_USABLE_MESSAGE]);
    expect(host.xhrsTo("/backend-api/conversation")).toHaveLength(0);
    expect(host.httpCalls).toHaveLength(0);
  });

  it("starts a fresh conversation after newConversation", async () => {
    const { host, bridge } = setup();
    await collect(bridge.askStream("hello"));

    bridge.newConversation();
    const fresh = bridge.conversation;
    expect(fresh.conversationId).toBeNull();
    expect(fresh.parentMessageId).not.toBe("m-2");
    expect(fresh.titleSet).toBe(false);

    await collect(bridge.askStream("new topic"));
    expect(host.lastXhrTo("/backend-api/conversation").jsonBody()).toMatchObject({
      conversation_id: null,
      parent_message_id: fresh.parentMessageId,
    });
  });

  it("joins the chunks in ask", async () => {
    const { bridge } = setup();
    expect(await bridge.ask("hello")).toBe("Hi there");
  });

  it("falls back to the unusable-response message when nothing arrives", async () => {
    const { host, bridge } = setup({ timeoutMs: 50, routes: {} });

    expect(await bridge.ask("hello")).toBe(UNUSABLE_RESPONSE_MESSAGE);
    expect(bridge.lastOutcome).toBe("timed_out");
    expect(host.nodeText(STREAM_NODE_ID)).toBeNull();
    expect(host.httpCalls).toHaveLength(0);
  });

  it("reports a read failure when the stream cannot be started", async () => {
    const { bridge, host, logger } = setup();
    await bridge.refreshSession();
    vi.spyOn(host, "evaluate").mockRejectedValueOnce(new Error("page gone"));

    expect(await collect(bridge.askStream("hello"))).toEqual([READ_FAILURE_MESSAGE]);
    expect(bridge.lastOutcome).toBe("failed");
    expect(logger.warn).toHaveBeenCalledWith("bridge", "failed to start conversation stream", "page gone");
  });

  it("is not ended early by a timed-out request that finishes during the next turn", async () => {
    const held: ScriptedXhr[] = [];
    const { host, bridge } = setup({
      timeoutMs: 40,
      routes: {
        "/backend-api/conversation": (xhr) => {
          const abandoned = held[0];
          if (!abandoned) {
            held.push(xhr);
            return;
          }
          abandoned.push(sseFrame({ messageId: "late", conversationId: "conv-late", parts: ["too late"] }));
          abandoned.finish();
          streamReply("conv-1")(xhr);
        },
      },
    });

    expect(await bridge.ask("first")).toBe(UNUSABLE_RESPONSE_MESSAGE);
    expect(bridge.lastOutcome).toBe("timed_out");

    expect(await bridge.ask("second")).toBe("Hi there");
    expect(bridge.lastOutcome).toBe("completed");
    expect(bridge.conversation.conversationId).toBe("conv-1");
    expect(host.nodeText(EOF_NODE_ID)).toBeNull();
  });

  it("starts clean after an abandoned request finishes between turns", async () => {
    const held: ScriptedXhr[] = [];
    const { host, bridge } = setup({
      timeoutMs: 40,
      routes: {
        "/backend-api/conversation": (xhr) => {
          if (held.length === 0) {
            held.push(xhr);
            return;
          }
          streamReply("conv-1")(xhr);
        },
      },
    });

    expect(await bridge.ask("first")).toBe(UNUSABLE_RESPONSE_MESSAGE);
    held[0]?.finish();
    expect(host.nodeText(EOF_NODE_ID)).toBeNull();

    expect(await bridge.ask("second")).toBe("Hi there");
    expect(await bridge.ask("third")).toBe("Hi there");
  });

  it("removes the mailbox when the consumer stops early", async () => {
    const { host, bridge } = setup();

    const seen: string[] = [];
    for await (const chunk of bridge.askStream("hello")) {
      seen.push(chunk);
      break;
    }

    expect(seen).toEqual(["Hi"]);
    expect(host.nodeText(STREAM_NODE_ID)).toBeNull();
  });

  it("warns when the title request fails", async () => {
    const { bridge, logger } = setup({ http: () => ({ status: 500, body: "boom" }) });

    await collect(bridge.askStream("hello"));

    await vi.waitFor(() => expect(logger.warn).toHaveBeenCalledWith("title", "Failed to set title"));
    expect(bridge.conversation.titleSet).toBe(false);
  });

  it("switches to an existing conversation at its current node", async () => {
    const { host, bridge } = setup({
      routes: {
        "/backend-api/conversation/conv-9": (xhr) => xhr.respond(200, '{"title":"Earlier","current_node":"node-5"}'),
        "/backend-api/conversation": streamReply("conv-9"),
      },
    });

    const info = await bridge.switchToConversation("conv-9");

    expect(info).toEqual({ title: "Earlier", current_node: "node-5" });
    expect(bridge.conversation).toEqual({ conversationId: "conv-9", parentMessageId: "node-5", titleSet: false });

    await collect(bridge.askStream("continue"));
    expect(host.lastXhrTo("/backend-api/conversation").jsonBody()).toMatchObject({
      conversation_id: "conv-9",
      parent_message_id: "node-5",
    });
    await vi.waitFor(() => expect(host.httpCalls).toHaveLength(1));
    expect(host.httpCalls[0]?.url).toBe("https://chat.openai.com/backend-api/conversation/gen_title/conv-9");
  });

  it("leaves the title flag alone when switching", async () => {
    const { bridge } = setup({
      routes: {
        "/backend-api/conversation": streamReply("conv-1"),
        "/backend-api/conversation/conv-9": (xhr) => xhr.respond(200, '{"current_node":"node-5"}'),
      },
    });
    await collect(bridge.askStream("hello"));
    await vi.waitFor(() => expect(bridge.conversation.titleSet).toBe(true));

    await bridge.switchToConversation("conv-9");

    expect(bridge.conversation).toEqual({ conversationId: "conv-9", parentMessageId: "node-5", titleSet: true });
  });

  it("keeps the parent when the conversation has no current node", async () => {
    const { bridge } = setup({
      routes: { "/backend-api/conversation/conv-9": (xhr) => xhr.respond(200, '{"title":"Earlier"}') },
    });
    const parent = bridge.conversation.parentMessageId;

    await bridge.switchToConversation("conv-9");

    expect(bridge.conversation).toEqual({ conversationId: "conv-9", parentMessageId: parent, titleSet: false });
  });

  it("maps history items by id", async () => {
    const { host, bridge } = setup({
      http: () => ({
        status: 200,
        body: { items: [{ id: "a", title: "First" }, { id: "b", title: "Second" }, { title: "no id" }], total: 3 },
      }),
    });

    const history = await bridge.getHistory(5, 10);

    expect(history).toEqual({ a: { id: "a", title: "First" }, b: { id: "b", title: "Second" } });
    expect(host.httpCalls[0]?.method).toBe("GET");
    expect(host.httpCalls[0]?.url).toBe("https://chat.openai.com/backend-api/conversations?offset=10&limit=5");
  });

  it("returns null history when the request fails", async () => {
    const { bridge, logger } = setup({ http: () => ({ status: 500, body: "boom" }) });

    expect(await bridge.getHistory()).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("history", "Failed to get history");
  });

  it("hides the current conversation and starts over", async () => {
    const { host, bridge } = setup({ http: () => ({ status: 200, body: { success: true } }) });
    await collect(bridge.askStream("hello"));
    await vi.waitFor(() => expect(bridge.conversation.titleSet).toBe(true));

    expect(await bridge.deleteConversation()).toEqual({ success: true });

    expect(host.httpCalls.filter((call) => call.method === "PATCH")).toEqual([
      {
        method: "PATCH",
        url: "https://chat.openai.com/backend-api/conversation/conv-1",
        headers: { Authorization: "Bearer test-token" },
        body: { is_visible: false },
      },
    ]);
    expect(bridge.conversation.conversationId).toBeNull();
  });

  it("leaves the current conversation alone when deleting another one", async () => {
    const { bridge } = setup({ http: () => ({ status: 200, body: { success: true } }) });
    await collect(bridge.askStream("hello"));

    await bridge.deleteConversation("conv-other");

    expect(bridge.conversation.conversationId).toBe("conv-1");
  });

  it("returns null when there is nothing to delete or the request fails", async () => {
    const { host, bridge, logger } = setup({ http: () => ({ status: 404, body: { detail: "missing" } }) });

    expect(await bridge.deleteConversation()).toBeNull();
    expect(host.httpCalls).toHaveLength(0);

    expect(await bridge.deleteConversation("conv-2")).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("conversation", "Failed to delete conversation", "conv-2");
  });
});
