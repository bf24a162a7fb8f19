import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { Workspace } from "../workspace";

describe("Workspace", () => {
  let root: string;
  let workspace: Workspace;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "qprof-ws-"));
    workspace = new Workspace(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("creates pending and outputs directories", async () => {
    await workspace.prepare();

    expect(existsSync(path.join(root, "pending"))).toBe(true);
    expect(existsSync(path.join(root, "outputs"))).toBe(true);
    expect(workspace.profileLog).toBe(path.join(root, "outputs", "sumoquery.profile.jsonl"));
  });

  it("tracks placeholders", async () => {
    await workspace.prepare();
    await workspace.markPending(["us2_2", "au_1"]);
    expect(await workspace.listPending()).toEqual(["au_1", "us2_2"]);

    await workspace.clearPending("au_1");
    expect(await workspace.listPending()).toEqual(["us2_2"]);
  });

  it("writes outputs with a trailing newline", async () => {
    const file = await workspace.writeOutput("us2_2", 1, "csv", "a,b\n1,2");

    expect(file).toBe(path.join(root, "outputs", "sumoquery.us2_2.001.csv"));
    expect(readFileSync(file, "utf8")).toBe("a,b\n1,2\n");
  });
});
