import type { ChatSource } from "./chat.js";

export type ModelErrorCategory =
  | "transient"
  | "invalid_request"
  | "unauthorized"
  | "rate_limited"
  | "embedding_unavailable"
  | "unknown";

/**
 * Events produced while answering one question. Every stream ends with exactly
 * one of `complete`, `stopped` or `error`; the `token` events before a
 * `complete` concatenate to its content.
 */
export type AnswerStreamEvent =
  | {
      type: "token";
      content: string;
    }
  | {
      type: "complete";
      content: string;
      sources: ChatSource[];
    }
  | {
      type: "stopped";
      content: string;
    }
  | {
      type: "error";
      content: string;
      category: ModelErrorCategory;
    };

export type AnswerTerminalEvent = Exclude<AnswerStreamEvent, { type: "token" }>;
