import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/** Where the engine's battery-backed RAM lives between sessions. The format is the adapter's business. */
export interface SaveStore {
  load(): Promise<Uint8Array | null>;
  save(bytes: Uint8Array): Promise<void>;
}

export class FileSaveStore implements SaveStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Uint8Array | null> {
    try {
      return new Uint8Array(await readFile(this.filePath));
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  }

  async save(bytes: Uint8Array): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, bytes);
    await rename(tmpPath, this.filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }
}
