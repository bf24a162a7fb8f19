import path from "node:path";
import { ensureDir, listFiles, removeFile, touch, writeText } from "@qprof/cli-adapters";
import { outputFileName, OUTPUT_PREFIX, type OutputFormat } from "./output";

export const DEFAULT_OUTPUT_DIR = "/var/tmp/sumoquery";
export const PROFILE_LOG_NAME = `${OUTPUT_PREFIX}.profile.jsonl`;

/**
 * Output directory layout:
 *
 *   <root>/pending/<target>   empty placeholder while a target is unfinished
 *   <root>/outputs/…          query results and the profile log
 */
export class Workspace {
  readonly root: string;
  readonly pendingDir: string;
  readonly outputsDir: string;

  constructor(root: string = DEFAULT_OUTPUT_DIR) {
    this.root = path.resolve(root);
    this.pendingDir = path.join(this.root, "pending");
    this.outputsDir = path.join(this.root, "outputs");
  }

  get profileLog(): string {
    return path.join(this.outputsDir, PROFILE_LOG_NAME);
  }

  async prepare(): Promise<void> {
    await ensureDir(this.pendingDir);
    await ensureDir(this.outputsDir);
  }

  async markPending(targets: readonly string[]): Promise<void> {
    for (const target of targets) {
      await touch(this.placeholder(target));
    }
  }

  async clearPending(target: string): Promise<void> {
    await removeFile(this.placeholder(target));
  }

  listPending(): Promise<string[]> {
    return listFiles(this.pendingDir);
  }

  /** Writes the result file and returns its path. */
  async writeOutput(target: string, queryNumber: number, format: OutputFormat, content: string): Promise<string> {
    const file = path.join(this.outputsDir, outputFileName(target, queryNumber, format));
    await writeText(file, content + "\n");
    return file;
  }

  private placeholder(target: string): string {
    return path.join(this.pendingDir, path.basename(target));
  }
}
