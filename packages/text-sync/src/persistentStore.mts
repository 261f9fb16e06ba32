import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { StoreUnavailableError } from "./errors.mjs";

/**
 * Durable home of the document text. One plain file, content verbatim,
 * no header or framing.
 */
export interface TextStore {
  /** Where the text lives, for status reporting. */
  readonly location: string;
  load(): Promise<string>;
  save(text: string): Promise<void>;
}

export interface FileTextStoreOptions {
  /** Write to a sibling temp file and rename it over the target. */
  atomic?: boolean;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export class FileTextStore implements TextStore {
  readonly location: string;
  private readonly atomic: boolean;

  constructor(path: string, options: FileTextStoreOptions = {}) {
    this.location = path;
    this.atomic = options.atomic ?? false;
  }

  async load(): Promise<string> {
    try {
      return await readFile(this.location, "utf8");
    } catch (error) {
      // nothing persisted yet
      if (errorCode(error) === "ENOENT") return "";
      throw new StoreUnavailableError(`Cannot read ${this.location}`, error);
    }
  }

  async save(text: string): Promise<void> {
    if (!this.atomic) {
      try {
        await writeFile(this.location, text, "utf8");
      } catch (error) {
        throw new StoreUnavailableError(`Cannot write ${this.location}`, error);
      }
      return;
    }

    const tempPath = `${this.location}.${randomBytes(6).toString("hex")}.tmp`;
    try {
      await writeFile(tempPath, text, "utf8");
      await rename(tempPath, this.location);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new StoreUnavailableError(`Cannot write ${this.location}`, error);
    }
  }
}
