import { appendFileSync, mkdirSync } from "fs";
import { join } from "path";
import { randomUUID } from "crypto";

export type TraceEventName = "request_start" | "token_rotated" | "stream_end";

export interface TraceEvent {
  trace_id: string;
  span_id: string;
  timestamp: string;  // ISO 8601
  event: TraceEventName;
  data?: Record<string, unknown>;
  duration_ms?: number;
}

/** Events of one `streamChat` call, all sharing a span id. */
export interface TraceSpan {
  readonly spanId: string;
  emit(event: TraceEventName, data?: Record<string, unknown>, durationMs?: number): void;
}

/** Appends one JSON object per line to `<traceDir>/<traceId>.jsonl`. */
export class Tracer {
  readonly traceId: string;
  readonly filePath: string;

  constructor(traceDir: string, traceId?: string) {
    this.traceId = traceId || randomUUID();
    mkdirSync(traceDir, { recursive: true });
    this.filePath = join(traceDir, `${this.traceId}.jsonl`);
  }

  startSpan(): TraceSpan {
    const spanId = randomUUID();
    return {
      spanId,
      emit: (event, data, durationMs) => this.write({ span_id: spanId, event, data, duration_ms: durationMs }),
    };
  }

  private write(event: Omit<TraceEvent, "trace_id" | "timestamp">): void {
    const line: TraceEvent = {
      trace_id: this.traceId,
      timestamp: new Date().toISOString(),
      ...event,
    };
    appendFileSync(this.filePath, JSON.stringify(line) + "\n");
  }
}
