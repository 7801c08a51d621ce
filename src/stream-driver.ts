import crypto from "node:crypto";

import { EOF_NODE_ID, PAGE_HELPERS, STREAM_NODE_ID } from "./dom-mailbox.js";

export type RequestEnvelope = {
  messages: Array<{
    id: string;
    role: "user";
    content: {
      content_type: "text";
      parts: [string];
    };
  }>;
  model: string;
  conversation_id: string | null;
  parent_message_id: string;
  action: "next";
};

export function newMessageId(): string {
  return crypto.randomUUID();
}

export function buildEnvelope(input: {
  prompt: string;
  model: string;
  conversationId: string | null;
  parentMessageId: string;
  messageId?: string;
}): RequestEnvelope {
  return {
    messages: [
      {
        id: input.messageId ?? newMessageId(),
        role: "user",
        content: {
          content_type: "text",
          parts: [input.prompt],
        },
      },
    ],
    model: input.model,
    conversation_id: input.conversationId,
    parent_message_id: input.parentMessageId,
    action: "next",
  };
}

export type StreamDriverInput = {
  url: string;
  accessToken: string;
  envelope: RequestEnvelope;
};

/**
 * Page script that posts the envelope and republishes the newest complete
 * event-stream frame into the mailbox. The response is cumulative, so only the
 * latest frame matters; anything that does not parse yet is left for the next
 * readyState change. Values are embedded with JSON.stringify so nothing in the
 * prompt or token can end the string literal.
 *
 * Leftover mailbox nodes are dropped before the new stream node is created. A
 * request whose stream node was removed (timed out or abandoned) never signals
 * end of stream, so it cannot end a later stream early.
 */
export function buildStreamDriverScript(input: StreamDriverInput): string {
  return `(() => {
  ${PAGE_HELPERS}
  dropNode(${JSON.stringify(STREAM_NODE_ID)});
  dropNode(${JSON.stringify(EOF_NODE_ID)});
  const streamNode = appendNode(${JSON.stringify(STREAM_NODE_ID)});
  const xhr = new XMLHttpRequest();
  let seen = 0;
  xhr.open("POST", ${JSON.stringify(input.url)});
  xhr.setRequestHeader("Accept", "text/event-stream");
  xhr.setRequestHeader("Content-Type", "application/json");
  xhr.setRequestHeader("Authorization", ${JSON.stringify(`Bearer ${input.accessToken}`)});
  xhr.onreadystatechange = function () {
    if (xhr.readyState === 3 || xhr.readyState === 4) {
      const text = xhr.responseText || "";
      let newEvent;
      try {
        const events = text.substring(seen).split(/\\n\\n/).reverse();
        events.shift();
        if (events[0] === "data: [DONE]") {
          events.shift();
        }
        if (events.length > 0) {
          newEvent = events[0].substring(6);
          JSON.parse(newEvent);
        }
      } catch (err) {
        newEvent = undefined;
      }
      if (newEvent !== undefined) {
        streamNode.textContent = encodePayload(newEvent);
        seen = text.length;
      }
    }
    if (xhr.readyState === 4 && streamNode.isConnected) {
      appendNode(${JSON.stringify(EOF_NODE_ID)});
    }
  };
  xhr.send(${JSON.stringify(JSON.stringify(input.envelope))});
  return true;
})()`;
}
