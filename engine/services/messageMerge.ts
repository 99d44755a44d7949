import crypto from "crypto";
import type { Message, Schema } from "../../shared/types/schema.js";
import type { MergeStrategy } from "../../shared/types/runbook.js";

/**
 * Merge fan-in inputs into one message carrying the common schema.
 *
 * concatenate: when every input's content is an array the arrays are
 * concatenated in input order; otherwise the merged content is the list of
 * input contents.
 */
export function mergeMessages(
  messages: readonly Message[],
  schema: Schema,
  strategy: MergeStrategy = "concatenate"
): Message {
  const [single] = messages;
  if (messages.length === 1 && single) {
    return single;
  }

  let content: unknown;
  switch (strategy) {
    case "concatenate": {
      const contents = messages.map((message) => message.content);
      content = contents.every(Array.isArray) ? contents.flat(1) : contents;
      break;
    }
  }

  return {
    id: crypto.randomUUID(),
    schema,
    content,
    producedAt: new Date().toISOString(),
    metadata: { mergedFrom: messages.map((message) => message.id) },
  };
}
