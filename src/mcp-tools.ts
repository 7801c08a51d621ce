import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { CamofoxBrowserHost } from "./camofox-browser-host.js";
import { ChatgptBridge } from "./chatgpt-bridge.js";
import type { BridgeConfig } from "./config.js";
import { toErrorMessage, UNUSABLE_RESPONSE_MESSAGE } from "./errors.js";
import type { Logger } from "./logger.js";

const makeTextContent = (text: string) => [{ type: "text" as const, text }];

/**
 * One bridge per process. Its session and conversation state are not safe for
 * concurrent callers, so every tool call goes through `runExclusive`.
 */
export class BridgeRuntime {
  readonly #config: BridgeConfig;
  readonly #logger: Logger;
  #bridge: Promise<ChatgptBridge> | null;
  #queue: Promise<unknown>;

  constructor(config: BridgeConfig, logger: Logger, bridge?: ChatgptBridge) {
    this.#config = config;
    this.#logger = logger;
    this.#bridge = bridge ? Promise.resolve(bridge) : null;
    this.#queue = Promise.resolve();
  }

  runExclusive<T>(task: (bridge: ChatgptBridge) => Promise<T>): Promise<T> {
    const run = this.#queue.then(async () => task(await this.#getBridge()));
    // keep the chain alive after a failed task; the caller still sees the rejection
    this.#queue = run.catch((error: unknown) => {
      this.#logger.debug("server", "tool call failed", toErrorMessage(error));
    });
    return run;
  }

  async close(): Promise<void> {
    const pending = this.#bridge;
    this.#bridge = null;
    if (pending) {
      const bridge = await pending;
      await bridge.close();
    }
  }

  #getBridge(): Promise<ChatgptBridge> {
    if (!this.#bridge) {
      const host = new CamofoxBrowserHost({ ...this.#config, logger: this.#logger });
      const bridge = new ChatgptBridge(host, { config: this.#config, logger: this.#logger });
      const starting = bridge.start().then(() => bridge);
      // a failed start must not poison later calls
      starting.catch(() => {
        if (this.#bridge === starting) {
          this.#bridge = null;
        }
      });
      this.#bridge = starting;
    }

    return this.#bridge;
  }
}

export function registerTools(server: McpServer, runtime: BridgeRuntime): void {
  server.registerTool(
    "chatgpt_bridge_session",
    {
      description: "Refresh the ChatGPT session from the browser and report whether it is usable.",
      inputSchema: {},
    },
    async () => {
      const session = await runtime.runExclusive(async (bridge) => bridge.refreshSession());
      const user = typeof session.user === "object" && session.user !== null ? session.user : null;
      const payload = {
        has_access_token: typeof session.accessToken === "string" && session.accessToken.length > 0,
        user,
        expires: typeof session.expires === "string" ? session.expires : null,
      };
      return {
        content: makeTextContent(JSON.stringify(payload, null, 2)),
        structuredContent: payload,
      };
    },
  );

  server.registerTool(
    "chatgpt_bridge_ask",
    {
      description:
        "Send a prompt through the browser session and return the assistant text. Chunks are reported as progress notifications when a progress token is supplied.",
      inputSchema: {
        prompt: z.string().min(1).describe("Prompt to send."),
        conversation_id: z.string().optional().describe("Continue this conversation instead of the current one."),
        new_conversation: z.boolean().optional().describe("Start a fresh conversation before sending."),
      },
    },
    async ({ prompt, conversation_id, new_conversation }, extra) => {
      const progressToken = extra._meta?.progressToken;

      return await runtime.runExclusive(async (bridge) => {
        if (new_conversation) {
          bridge.newConversation();
        }
        if (conversation_id) {
          await bridge.switchToConversation(conversation_id);
        }

        const chunks: string[] = [];
        for await (const chunk of bridge.askStream(prompt)) {
          chunks.push(chunk);
          if (progressToken !== undefined) {
            await extra.sendNotification({
              method: "notifications/progress",
              params: { progressToken, progress: chunks.length, message: chunk },
            });
          }
        }

        const text = chunks.length > 0 ? chunks.join("") : UNUSABLE_RESPONSE_MESSAGE;
        const { conversationId, parentMessageId } = bridge.conversation;
        return {
          content: makeTextContent(text),
          structuredContent: {
            text,
            conversation_id: conversationId,
            parent_message_id: parentMessageId,
            outcome: bridge.lastOutcome,
          },
        };
      });
    },
  );

  server.registerTool(
    "chatgpt_bridge_new_conversation",
    {
      description: "Forget the current conversation; the next prompt starts a new one.",
      inputSchema: {},
    },
    async () => {
      const state = await runtime.runExclusive(async (bridge) => {
        bridge.newConversation();
        return bridge.conversation;
      });
      return {
        content: makeTextContent("new conversation started"),
        structuredContent: { conversation_id: state.conversationId, parent_message_id: state.parentMessageId },
      };
    },
  );

  server.registerTool(
    "chatgpt_bridge_switch_conversation",
    {
      description: "Continue an existing conversation by id.",
      inputSchema: {
        conversation_id: z.string().min(1).describe("Conversation id to continue."),
      },
    },
    async ({ conversation_id }) => {
      const state = await runtime.runExclusive(async (bridge) => {
        await bridge.switchToConversation(conversation_id);
        return bridge.conversation;
      });
      return {
        content: makeTextContent(`switched to ${conversation_id}`),
        structuredContent: { conversation_id: state.conversationId, parent_message_id: state.parentMessageId },
      };
    },
  );

  server.registerTool(
    "chatgpt_bridge_history",
    {
      description: "List recent conversations, keyed by id.",
      inputSchema: {
        limit: z.number().int().positive().max(100).optional().describe("Page size. Default 20."),
        offset: z.number().int().nonnegative().optional().describe("Page offset. Default 0."),
      },
    },
    async ({ limit, offset }) => {
      const history = await runtime.runExclusive(async (bridge) => bridge.getHistory(limit, offset));
      if (!history) {
        return { isError: true, content: makeTextContent("history_unavailable") };
      }

      return {
        content: makeTextContent(JSON.stringify(history, null, 2)),
        structuredContent: { conversations: history },
      };
    },
  );

  server.registerTool(
    "chatgpt_bridge_delete_conversation",
    {
      description: "Hide a conversation (defaults to the current one).",
      inputSchema: {
        conversation_id: z.string().optional().describe("Conversation id; the current conversation when omitted."),
      },
    },
    async ({ conversation_id }) => {
      const result = await runtime.runExclusive(async (bridge) => bridge.deleteConversation(conversation_id));
      if (result === null) {
        return { isError: true, content: makeTextContent("delete_conversation_failed") };
      }

      return {
        content: makeTextContent(JSON.stringify(result, null, 2)),
      };
    },
  );
}
