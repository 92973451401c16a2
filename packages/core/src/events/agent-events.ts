import type { BusEventName } from "./events.js";

export interface AgentEvent {
  type: BusEventName;
  data: Record<string, unknown>;
  timestamp: number;
}

type EventHandler = (event: AgentEvent) => void | Promise<void>;

export class AgentEventBus {
  private handlers: EventHandler[] = [];

  subscribe(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      const idx = this.handlers.indexOf(handler);
      if (idx >= 0) this.handlers.splice(idx, 1);
    };
  }

  emit(type: BusEventName, data: Record<string, unknown> = {}): void {
    const event: AgentEvent = { type, data, timestamp: Date.now() };
    for (const handler of this.handlers) {
      try {
        const pending = handler(event);
        if (pending instanceof Promise) {
          pending.catch((err: unknown) => console.error("[agent-events] async handler error:", err));
        }
      } catch (err) {
        console.error("[agent-events] handler error:", err);
      }
    }
  }
}
