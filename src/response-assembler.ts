import { z } from "zod";

import type { BrowserHost } from "./browser-host.js";
import { decodePayload, EOF_NODE_ID, hasNode, readNodeHtml, sleep, STREAM_NODE_ID } from "./dom-mailbox.js";
import { READ_FAILURE_MESSAGE, toErrorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

export const streamFrameSchema = z.object({
  conversation_id: z.string(),
  message: z.object({
    id: z.string(),
    content: z.object({
      parts: z.array(z.string()),
    }),
  }),
});

export type StreamFrame = z.infer<typeof streamFrameSchema>;

export type AssemblerOutcome = "completed" | "timed_out" | "failed";

export type AssembleOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
  logger: Logger;
  onFrame?: (frame: StreamFrame) => void;
  onFinish?: (outcome: AssemblerOutcome) => void;
};

/**
 * Throws on anything other than a well-formed frame; null for an empty payload
 * or a JSON `null` event.
 */
export function parseFrame(encoded: string): StreamFrame | null {
  const raw = decodePayload(encoded);
  if (raw === null) {
    return null;
  }

  const event: unknown = JSON.parse(raw);
  if (event === null) {
    return null;
  }

  return streamFrameSchema.parse(event);
}

export function frameText(frame: StreamFrame): string {
  return frame.message.content.parts.join("\n");
}

/**
 * Polls the mailbox and yields the text added since the previous frame.
 *
 * The timeout only ends the loop on a tick where no frame was read; once the
 * stream is producing frames it runs until the end-of-stream node appears.
 * Cleanup of the mailbox is the caller's job so it also happens when the
 * consumer stops iterating early.
 */
export async function* assembleResponse(
  host: BrowserHost,
  options: AssembleOptions,
): AsyncGenerator<string, AssemblerOutcome, void> {
  const { logger } = options;
  const startedAt = Date.now();
  let lastMessage = "";

  const finish = (outcome: AssemblerOutcome): AssemblerOutcome => {
    logger.debug("assembler", `stream ${outcome}`, { elapsedMs: Date.now() - startedAt });
    options.onFinish?.(outcome);
    return outcome;
  };

  while (true) {
    let eofSeen = false;
    let fullEventMessage: string | null = null;

    try {
      eofSeen = await hasNode(host, EOF_NODE_ID);
      const encoded = await readNodeHtml(host, STREAM_NODE_ID);
      if (encoded !== null) {
        const frame = parseFrame(encoded);
        if (frame) {
          options.onFrame?.(frame);
          fullEventMessage = frameText(frame);
        }
      }
    } catch (error) {
      logger.warn("assembler", "failed to read stream frame", toErrorMessage(error));
      yield READ_FAILURE_MESSAGE;
      return finish("failed");
    }

    if (fullEventMessage !== null) {
      const chunk = fullEventMessage.slice(lastMessage.length);
      lastMessage = fullEventMessage;
      if (chunk) {
        yield chunk;
      }
    }

    if (eofSeen) {
      return finish("completed");
    }

    if (fullEventMessage === null && Date.now() - startedAt > options.timeoutMs) {
      return finish("timed_out");
    }

    await sleep(options.pollIntervalMs);
  }
}
