/**
 * Trace event types emitted while loading a container.
 */
export type LoadTraceEvent =
  | { tag: "E_RecordRead"; id: string; record: string; bytes: number; durationMs: number }
  | { tag: "E_ArchiveRead"; id: string; archive: string; durationMs: number }
  | { tag: "E_TypeLoaded"; id: string; typeName: string; found: boolean; durationMs: number }
  | { tag: "E_ExtraFile"; id: string; key: string; found: boolean }
  | { tag: "E_LegacyDetected"; id: string; delegated: boolean }
  | { tag: "E_TensorMaterialized"; id: string; storage: string; dtype: string; shape: number[]; device: string };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: LoadTraceEvent): void;
}

/**
 * Sink that drops every event.
 */
export const noopTraceSink: TraceSink = {
  emit: () => undefined,
};

/**
 * Sink that appends events to the given array.
 */
export function collectingTraceSink(events: LoadTraceEvent[] = []): TraceSink & { events: LoadTraceEvent[] } {
  return {
    events,
    emit: (event: LoadTraceEvent) => {
      events.push(event);
    },
  };
}

/**
 * Sink that writes one line per event to the console.
 */
export function consoleTraceSink(log: (line: string) => void = console.log): TraceSink {
  return {
    emit(event: LoadTraceEvent): void {
      const { tag, id, ...rest } = event;
      log(`[graph-archive] ${tag} ${id} ${JSON.stringify(rest)}`);
    },
  };
}

/**
 * Correlation id for a trace event.
 */
export function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}
