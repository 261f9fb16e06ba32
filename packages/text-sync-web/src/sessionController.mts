import type { Session, SessionChannel } from "../../text-sync/src/connectionRegistry.mjs";
import { MalformedMessageError, OversizedContentError } from "../../text-sync/src/errors.mjs";
import type { Logger } from "../../text-sync/src/logger.mjs";
import { encodeMessage, errorMessage, parseInboundMessage } from "../../text-sync/src/protocol.mjs";
import type { EditRequest, ErrorMessage } from "../../text-sync/src/protocol.mjs";
import type { SyncHub } from "../../text-sync/src/syncHub.mjs";

/**
 * Drives one WebSocket connection: turns its frames into hub edits and
 * answers garbage with an `error` frame. Nothing malformed reaches the hub.
 */
export class SessionController {
  private opening: Promise<Session> | null = null;
  private closed = false;

  constructor(
    private readonly hub: SyncHub,
    private readonly channel: SessionChannel,
    private readonly logger: Logger
  ) {}

  open(userId: string | null = null): Promise<Session> {
    if (!this.opening) {
      this.opening = this.hub.connect(this.channel, userId);
    }
    return this.opening;
  }

  async receive(raw: string): Promise<void> {
    if (this.closed) return;

    let request: EditRequest;
    try {
      request = parseInboundMessage(raw);
    } catch (error) {
      if (!(error instanceof MalformedMessageError)) throw error;
      this.logger.warn("Rejected message:", error.message);
      await this.reply(errorMessage(error.code, error.message));
      return;
    }

    const session = await this.open();
    // dropped by the hub as unreachable, or already gone
    if (this.closed || !this.hub.isConnected(session.id)) return;

    this.hub.identify(session.id, request.userId);
    try {
      await this.hub.onEdit({
        content: request.content,
        userId: request.userId,
        timestamp: new Date(),
        origin: session.id
      });
    } catch (error) {
      if (!(error instanceof OversizedContentError)) throw error;
      this.logger.warn("Rejected message:", error.message);
      await this.reply(errorMessage(error.code, error.message));
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.opening) return;
    const session = await this.opening;
    await this.hub.disconnect(session.id);
  }

  private async reply(message: ErrorMessage): Promise<void> {
    try {
      await this.channel.send(encodeMessage(message));
    } catch (error) {
      this.logger.debug("Could not deliver error reply:", error instanceof Error ? error.message : error);
    }
  }
}
