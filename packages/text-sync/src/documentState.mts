/**
 * An immutable view of the shared document at one point in time.
 */
export interface DocumentSnapshot {
  readonly content: string;
  readonly lastModified: Date;

  /**
   * Client-supplied label of whoever wrote last. Not authenticated and not
   * unique; only meant for telling edits apart on screen.
   */
  readonly lastEditor: string | null;
}

/**
 * A request to replace the whole document. Lives for one
 * apply-and-broadcast cycle; no history is kept.
 */
export interface EditEvent {
  readonly content: string;
  readonly userId: string | null;
  readonly timestamp: Date;

  /** Session the edit arrived on. Absent for edits made over HTTP. */
  readonly origin?: string;
}

export class DocumentState {
  private content: string;
  private lastModified: Date;
  private lastEditor: string | null = null;

  constructor(initialContent = "", lastModified: Date = new Date()) {
    this.content = initialContent;
    this.lastModified = new Date(lastModified.getTime());
  }

  /**
   * Last writer wins: the edit replaces everything, whatever its timestamp
   * says relative to the current state.
   */
  apply(edit: EditEvent): DocumentSnapshot {
    this.content = edit.content;
    this.lastModified = new Date(edit.timestamp.getTime());
    this.lastEditor = edit.userId;
    return this.read();
  }

  read(): DocumentSnapshot {
    return {
      content: this.content,
      lastModified: new Date(this.lastModified.getTime()),
      lastEditor: this.lastEditor
    };
  }
}
