import path from "node:path";
import { appendText } from "../io/fs-artifacts";

export interface JsonlSink<T> {
  readonly file: string;
  emit(event: T): Promise<void>;
}

/**
 * Append-only JSON Lines sink. A directory argument resolves to
 * `<dir>/<defaultName>`; a path ending in `.jsonl` is used as is.
 */
export function createJsonlSink<T>(fileOrDir: string, defaultName: string): JsonlSink<T> {
  const file = fileOrDir.endsWith(".jsonl") ? fileOrDir : path.join(fileOrDir, defaultName);
  return {
    file,
    async emit(event: T) {
      await appendText(file, JSON.stringify(event) + "\n");
    },
  };
}
