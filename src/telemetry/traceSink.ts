import type { Logger } from "../logging/logger";
import type { TraceEventV0 } from "./schemas/traceEventV0";

export interface TraceSink {
  emit(event: TraceEventV0): void;
}

export function createLoggerTraceSink(logger: Logger): TraceSink {
  const log = logger.child({ component: "trace" });
  return {
    emit(event) {
      log.info({ event: `trace_${event.type}`, trace: event }, `${event.type} ${event.stage}`);
    },
  };
}

export type MemoryTraceSink = TraceSink & { readonly events: TraceEventV0[] };

export function createMemoryTraceSink(): MemoryTraceSink {
  const events: TraceEventV0[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
  };
}
