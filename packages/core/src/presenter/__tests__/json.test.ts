import { describe, it, expect, vi, beforeEach, type MockInstance } from "vitest";
import { CliError, CLI_ERROR_CODES } from "../../errors";
import { createJsonPresenter } from "../json";

describe("JsonPresenter", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => { });
  });

  it("should report JSON mode without TTY", () => {
    const presenter = createJsonPresenter();

    expect(presenter.isTTY).toBe(false);
    expect(presenter.isJSON).toBe(true);
  });

  it("should drop plain text lines", () => {
    const presenter = createJsonPresenter();
    presenter.write("Hello, world!");
    presenter.info("info");
    presenter.warn("warn");

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("should write errors as JSON with ok: false", () => {
    const presenter = createJsonPresenter();
    presenter.error("Error message");

    expect(consoleLogSpy).toHaveBeenCalledWith(
      JSON.stringify({ ok: false, error: { message: "Error message" } })
    );
  });

  it("should write JSON payloads on a single line", () => {
    const presenter = createJsonPresenter();
    const payload = { ok: true, summary: { targets: 2, failures: [] } };
    presenter.json(payload);

    expect(consoleLogSpy).toHaveBeenCalledWith('{"ok":true,"summary":{"targets":2,"failures":[]}}');
  });

  it("should print failures in the error envelope with warnings", () => {
    const presenter = createJsonPresenter();
    const error = new CliError(CLI_ERROR_CODES.E_INVALID_RANGE, "Invalid range: 5x", { range: "5x" });

    presenter.fail(error, ["runtime: 12ms"]);
    presenter.fail(new Error("boom"));

    expect(consoleLogSpy.mock.calls).toEqual([
      ['{"ok":false,"error":{"code":"E_INVALID_RANGE","message":"Invalid range: 5x","details":{"range":"5x"}},"warnings":["runtime: 12ms"]}'],
      ['{"ok":false,"error":{"message":"boom"}}'],
    ]);
  });
});
