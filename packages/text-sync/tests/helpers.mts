import { vi } from "vitest";
import type { SessionChannel } from "../src/connectionRegistry.mjs";
import { StoreUnavailableError } from "../src/errors.mjs";
import type { Logger } from "../src/logger.mjs";
import type { TextStore } from "../src/persistentStore.mjs";
import { parseOutboundMessage } from "../src/protocol.mjs";
import type { OutboundMessage } from "../src/protocol.mjs";

type MessageOf<T extends OutboundMessage["type"]> = Extract<OutboundMessage, { type: T }>;

/**
 * In-process stand-in for a client socket. `mode` decides what the next
 * send does: deliver, fail, or never settle.
 */
export class FakeChannel implements SessionChannel {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  mode: "ok" | "fail" | "hang" = "ok";

  send(payload: string): Promise<void> {
    if (this.mode === "fail") return Promise.reject(new Error("connection reset"));
    if (this.mode === "hang") return new Promise<void>(() => {});
    this.sent.push(payload);
    return Promise.resolve();
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  messages(): OutboundMessage[] {
    return this.sent.map((payload) => parseOutboundMessage(payload));
  }

  ofType<T extends OutboundMessage["type"]>(type: T): MessageOf<T>[] {
    return this.messages().filter((message): message is MessageOf<T> => message.type === type);
  }

  last(): OutboundMessage | undefined {
    return this.messages().at(-1);
  }
}

export class MemoryStore implements TextStore {
  readonly location = "memory";
  readonly saved: string[] = [];
  failLoads = false;
  failSaves = false;

  constructor(
    public text = "",
    private readonly delayMs = 0
  ) {}

  async load(): Promise<string> {
    if (this.failLoads) throw new StoreUnavailableError("Cannot read memory");
    return this.text;
  }

  async save(text: string): Promise<void> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    if (this.failSaves) throw new StoreUnavailableError("Cannot write memory: disk full");
    this.text = text;
    this.saved.push(text);
  }
}

export function spyLogger() {
  return {
    debug: vi.fn<Logger["debug"]>(),
    info: vi.fn<Logger["info"]>(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>()
  };
}
