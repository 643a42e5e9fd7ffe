import type { StreamEvent } from "@threadline/sdk";
import type { ConversationLog } from "./conversation-log.js";

export interface TurnRequest {
  /** History the turn continues; already holds the user's new message. */
  log: ConversationLog;
  resourceId: string;
  abortSignal?: AbortSignal;
}

/**
 * The agent that actually answers. It streams live events for one turn and
 * appends the turn's finalized items to the log itself before the stream
 * ends.
 */
export interface AgentRuntime {
  streamTurn(request: TurnRequest): AsyncIterable<StreamEvent>;
}
