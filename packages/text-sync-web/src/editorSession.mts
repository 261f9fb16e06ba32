import { parseOutboundMessage } from "../../text-sync/src/protocol.mjs";
import type { InboundMessage } from "../../text-sync/src/protocol.mjs";

export type ConnectionStatus = "connecting" | "connected" | "disconnected";

/** What the editor page shows. The browser entry binds it to the DOM. */
export interface EditorView {
  showText(text: string, fromPeer: boolean): void;
  showUserCount(count: number): void;
  showStatus(status: ConnectionStatus): void;
  showError(message: string): void;
}

/** How long a peer's edit stays highlighted. */
export const PEER_HIGHLIGHT_MS = 2_000;

/**
 * Client-side state of one editor tab. Holds no socket; the caller sends
 * whatever `localChange` returns and feeds server frames to
 * `handleServerMessage`.
 */
export class EditorSession {
  private text = "";
  private lastSent = "";

  constructor(
    public userId: string,
    private readonly view: EditorView
  ) {}

  currentText(): string {
    return this.text;
  }

  /** Applies the document fetched from `GET /text`. */
  load(content: string): void {
    this.text = content;
    this.lastSent = content;
    this.view.showText(content, false);
  }

  handleServerMessage(raw: string): void {
    const message = parseOutboundMessage(raw);
    switch (message.type) {
      case "initial_state":
        this.load(message.content);
        this.view.showUserCount(message.user_count);
        break;
      case "text_update":
        // our own edit coming back; the textarea may already be ahead of it
        if (message.echo) return;
        this.text = message.content;
        this.lastSent = message.content;
        this.view.showText(message.content, true);
        break;
      case "user_count_update":
        this.view.showUserCount(message.user_count);
        break;
      case "error":
        this.view.showError(message.message);
        break;
    }
  }

  /**
   * Returns the frame to send for the textarea's new value, or null when
   * the text matches what the server last saw from us.
   */
  localChange(text: string, now: Date = new Date()): string | null {
    this.text = text;
    if (text === this.lastSent) return null;
    this.lastSent = text;
    const message: InboundMessage = {
      type: "text_update",
      content: text,
      user_id: this.userId,
      timestamp: now.toISOString()
    };
    return JSON.stringify(message);
  }
}
