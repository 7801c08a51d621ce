import { CamofoxBrowserHost } from "./camofox-browser-host.js";
import { ChatgptBridge } from "./chatgpt-bridge.js";
import { resolveConfig } from "./config.js";
import { createLogger } from "./logger.js";

const SELF_TEST_MARKER = "SELF_TEST_OK";

function readFlagValue(flag: string): string | null {
  const args = process.argv.slice(2);
  const direct = args.find((entry) => entry.startsWith(`${flag}=`));
  if (direct) {
    return direct.slice(flag.length + 1).trim() || null;
  }

  const idx = args.indexOf(flag);
  if (idx >= 0) {
    const value = String(args[idx + 1] ?? "").trim();
    return value || null;
  }

  return null;
}

async function main(): Promise<void> {
  const config = resolveConfig({
    browserBaseUrl: readFlagValue("--browser") ?? undefined,
    sessionToken: readFlagValue("--token") ?? undefined,
  });
  const logger = createLogger({ level: "info", debugLogFile: config.debugLogFile ?? undefined });
  const bridge = new ChatgptBridge(new CamofoxBrowserHost({ ...config, logger }), { config, logger });

  try {
    await bridge.start();

    const session = await bridge.refreshSession();
    if (typeof session.accessToken !== "string") {
      throw new Error("session_not_usable: log in to ChatGPT in the browser first");
    }
    const user = session.user;
    const email: unknown = typeof user === "object" && user !== null ? Reflect.get(user, "email") : undefined;
    console.log(`[ok] session: ${typeof email === "string" ? email : "unknown"}`);

    const answer = await bridge.ask(`Reply exactly with ${SELF_TEST_MARKER}`);
    if (!answer.includes(SELF_TEST_MARKER)) {
      throw new Error(`ask_mismatch (${bridge.lastOutcome ?? "unknown"}): ${answer.slice(0, 200)}`);
    }
    console.log(`[ok] ask (conversation ${bridge.conversation.conversationId ?? "none"})`);

    const deleted = await bridge.deleteConversation();
    console.log(deleted === null ? "[warn] cleanup: conversation not deleted" : "[ok] cleanup");
  } finally {
    await bridge.close();
  }
}

main().catch((error) => {
  console.error("self-test failed:", error);
  process.exit(1);
});
