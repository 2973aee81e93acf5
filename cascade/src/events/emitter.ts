import type { CascadeEvent, CascadeEventKind } from "../types/index.js";
import { createEvent } from "../types/index.js";

type Listener = (event: CascadeEvent) => void;

interface Stream {
  backlog: CascadeEvent[];
  pending: ((event: CascadeEvent | undefined) => void) | undefined;
  done: boolean;
}

/**
 * Reports what a cascade pass recovered from or changed. Listeners run
 * synchronously inside `emit`; `events()` streams are for async consumers.
 */
export class CascadeEventEmitter {
  private readonly listeners = new Set<Listener>();
  private readonly streams = new Set<Stream>();
  onEvent: Listener | undefined;

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(
    kind: CascadeEventKind,
    message: string,
    data: Record<string, unknown> = {},
  ): CascadeEvent {
    const event = createEvent(kind, message, data);
    this.onEvent?.(event);
    for (const listener of this.listeners) {
      listener(event);
    }
    for (const stream of this.streams) {
      if (stream.done) continue;
      const resolve = stream.pending;
      if (resolve) {
        stream.pending = undefined;
        resolve(event);
      } else {
        stream.backlog.push(event);
      }
    }
    return event;
  }

  events(): AsyncGenerator<CascadeEvent> {
    // Attached before the first next() so nothing emitted in between is lost.
    const stream: Stream = { backlog: [], pending: undefined, done: false };
    this.streams.add(stream);
    const streams = this.streams;

    async function* drain(): AsyncGenerator<CascadeEvent> {
      try {
        for (;;) {
          const next = stream.backlog.shift();
          if (next) {
            yield next;
            continue;
          }
          if (stream.done) return;
          const event = await new Promise<CascadeEvent | undefined>((resolve) => {
            stream.pending = resolve;
          });
          if (event === undefined) return;
          yield event;
        }
      } finally {
        stream.done = true;
        streams.delete(stream);
      }
    }

    return drain();
  }

  /** Streams that have not finished yet. */
  get openStreams(): number {
    return this.streams.size;
  }

  close(): void {
    for (const stream of this.streams) {
      stream.done = true;
      const resolve = stream.pending;
      stream.pending = undefined;
      resolve?.(undefined);
    }
    this.streams.clear();
  }
}
