// === Chat input ===

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

// === Token pool ===

export interface CredentialEntry {
  token: string;
  exhausted: boolean;
}

// === Output ===

/** Why a stream ended without finishing normally. */
export type FailureReason = "pool_exhausted" | "http_error" | "transport_error";

export interface AnswerEvent {
  type: "answer";
  text: string;
}

/** Only emitted when the client is built with `reportErrors: true`. */
export interface ErrorEvent {
  type: "error";
  reason: FailureReason;
  message: string;
}

export type OutputEvent = AnswerEvent | ErrorEvent;

export type StreamOutcome = "completed" | FailureReason;
