import { ConnectionRegistry } from "./connectionRegistry.mjs";
import type { Session, SessionChannel } from "./connectionRegistry.mjs";
import { DocumentState } from "./documentState.mjs";
import type { DocumentSnapshot, EditEvent } from "./documentState.mjs";
import { OversizedContentError, SessionUnreachableError, StoreUnavailableError } from "./errors.mjs";
import type { Logger } from "./logger.mjs";
import type { TextStore } from "./persistentStore.mjs";
import {
  encodeMessage,
  initialStateMessage,
  textUpdateMessage,
  userCountMessage
} from "./protocol.mjs";

export interface SyncHubOptions {
  store: TextStore;
  registry?: ConnectionRegistry;
  logger?: Logger;
  /** Largest accepted document, in UTF-8 bytes. */
  maxContentBytes: number;
  /** How long one session may take to accept one message before it is dropped. */
  sendTimeoutMs: number;
}

export interface HubStatus {
  connectedSessions: number;
  textLength: number;
  lastModified: Date;
  lastEditor: string | null;
}

export interface BroadcastReport {
  delivered: string[];
  dropped: SessionUnreachableError[];
}

function sendWithin(channel: SessionChannel, payload: string, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`send timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const fail = (error: unknown) => {
      clearTimeout(timer);
      reject(error);
    };
    try {
      channel.send(payload).then(() => {
        clearTimeout(timer);
        resolve();
      }, fail);
    } catch (error) {
      fail(error);
    }
  });
}

/**
 * Loads the persisted text and builds a hub around it. An unreadable store
 * is logged and the hub starts from an empty document.
 */
export async function createSyncHub(options: SyncHubOptions): Promise<SyncHub> {
  const logger = options.logger ?? console;
  let content = "";
  try {
    content = await options.store.load();
  } catch (error) {
    if (!(error instanceof StoreUnavailableError)) throw error;
    logger.warn(`${error.message}, starting from an empty document`);
  }
  return new SyncHub({ ...options, logger }, new DocumentState(content));
}

/**
 * Single entry point for every change to the shared document.
 *
 * Edits, connects and disconnects are queued and run one at a time, so the
 * apply / persist / broadcast sequence of one edit never interleaves with
 * another's. Every session therefore sees edits in the order the hub
 * received them, and the document ends up holding the last one.
 */
export class SyncHub {
  private readonly state: DocumentState;
  private readonly store: TextStore;
  private readonly registry: ConnectionRegistry;
  private readonly logger: Logger;
  private readonly maxContentBytes: number;
  private readonly sendTimeoutMs: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: SyncHubOptions, state: DocumentState = new DocumentState()) {
    this.state = state;
    this.store = options.store;
    this.registry = options.registry ?? new ConnectionRegistry();
    this.logger = options.logger ?? console;
    this.maxContentBytes = options.maxContentBytes;
    this.sendTimeoutMs = options.sendTimeoutMs;
  }

  get storeLocation(): string {
    return this.store.location;
  }

  get sessionCount(): number {
    return this.registry.size;
  }

  isConnected(sessionId: string): boolean {
    return this.registry.has(sessionId);
  }

  read(): DocumentSnapshot {
    return this.state.read();
  }

  status(): HubStatus {
    const snapshot = this.state.read();
    return {
      connectedSessions: this.registry.size,
      // code points, not UTF-16 units
      textLength: [...snapshot.content].length,
      lastModified: snapshot.lastModified,
      lastEditor: snapshot.lastEditor
    };
  }

  /**
   * Rejects with `OversizedContentError` before anything changes when the
   * content is over the limit. Otherwise resolves with the state the edit
   * produced, once it has been persisted (or failed to be) and broadcast.
   */
  async onEdit(edit: EditEvent): Promise<DocumentSnapshot> {
    const size = Buffer.byteLength(edit.content, "utf8");
    if (size > this.maxContentBytes) {
      throw new OversizedContentError(size, this.maxContentBytes);
    }
    return this.enqueue(() => this.commit(edit));
  }

  connect(channel: SessionChannel, userId: string | null = null): Promise<Session> {
    return this.enqueue(async () => {
      const session = this.registry.register(channel, userId);
      this.logger.info(`Client connected. Total clients: ${this.registry.size}`);
      const initial = encodeMessage(initialStateMessage(this.state.read(), this.registry.size));
      if (await this.deliver(session, initial)) {
        await this.broadcastUserCount();
      }
      return session;
    });
  }

  disconnect(sessionId: string): Promise<void> {
    return this.enqueue(async () => {
      if (!this.registry.unregister(sessionId)) return;
      this.logger.info(`Client disconnected. Total clients: ${this.registry.size}`);
      await this.broadcastUserCount();
    });
  }

  /** Records the label a client chose for itself. */
  identify(sessionId: string, userId: string | null): void {
    this.registry.setUserId(sessionId, userId);
  }

  /** Lets queued work finish, then closes every session. */
  close(): Promise<void> {
    return this.enqueue(async () => {
      this.registry.forEach((session) => {
        this.registry.unregister(session.id);
        session.channel.close(1001, "server shutting down");
      });
    });
  }

  /* ---------------- internals ---------------- */

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // the caller sees a failure through `run`; the queue just moves on
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async commit(edit: EditEvent): Promise<DocumentSnapshot> {
    const snapshot = this.state.apply(edit);

    try {
      await this.store.save(snapshot.content);
    } catch (error) {
      // in-memory state already moved on; keep serving it
      this.logger.error(
        "Persisting the document failed, broadcasting anyway:",
        error instanceof Error ? error.message : error
      );
    }

    const report = await this.broadcast((session) =>
      encodeMessage(textUpdateMessage(snapshot, session.id === edit.origin))
    );
    this.logger.info(`Text updated by ${edit.userId ?? "unknown"}`);
    this.logger.debug(
      `Update delivered to ${report.delivered.length} session(s), dropped ${report.dropped.length}`
    );
    return snapshot;
  }

  private async broadcast(render: (session: Session) => string): Promise<BroadcastReport> {
    const report: BroadcastReport = { delivered: [], dropped: [] };
    const pending: Promise<void>[] = [];

    this.registry.forEach((session) => {
      pending.push(
        sendWithin(session.channel, render(session), this.sendTimeoutMs).then(
          () => {
            report.delivered.push(session.id);
          },
          (cause: unknown) => {
            const dropped = this.drop(session, cause);
            if (dropped) report.dropped.push(dropped);
          }
        )
      );
    });
    await Promise.all(pending);

    if (report.dropped.length > 0) {
      await this.broadcastUserCount();
    }
    return report;
  }

  private broadcastUserCount(): Promise<BroadcastReport> {
    const payload = encodeMessage(userCountMessage(this.registry.size));
    return this.broadcast(() => payload);
  }

  private async deliver(session: Session, payload: string): Promise<boolean> {
    try {
      await sendWithin(session.channel, payload, this.sendTimeoutMs);
      return true;
    } catch (cause) {
      this.drop(session, cause);
      return false;
    }
  }

  private drop(session: Session, cause: unknown): SessionUnreachableError | undefined {
    if (!this.registry.unregister(session.id)) return undefined;
    const error = new SessionUnreachableError(
      session.id,
      `Dropping session ${session.id}: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
    this.logger.warn(error.message);
    session.channel.close(1013, "unreachable");
    return error;
  }
}
