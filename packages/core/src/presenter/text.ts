import { failureLine } from "./failure";
import type { Presenter } from "./types";

/** Human output on stdout; warnings and errors on stderr. Quiet keeps only errors. */
export function createTextPresenter(isQuiet: boolean = false): Presenter {
  const out = (line: string) => {
    if (!isQuiet) {
      console.log(line);
    }
  };
  return {
    isTTY: process.stdout.isTTY === true,
    isQuiet,
    isJSON: false,
    write: out,
    info: out,
    warn: (line) => {
      if (!isQuiet) {
        console.warn(line);
      }
    },
    error: (line) => console.error(line),
    fail: (error) => console.error(failureLine(error)),
    json: () => {
      throw new Error("json() called in text mode");
    },
  };
}
