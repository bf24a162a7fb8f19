import { beforeEach } from "vitest";
import { initLogging } from "@qprof/cli-core";

// Keep test output free of log lines unless a test installs its own destination.
beforeEach(() => {
  process.env.NO_COLOR = "1";
  initLogging({ level: "silent" });
});
