import { failurePayload } from "./failure";
import type { Presenter } from "./types";

/**
 * One JSON document per line on stdout. Plain text is dropped; commands
 * collect anything worth keeping in ctx.diagnostics.
 */
export function createJsonPresenter(): Presenter {
  const print = (payload: unknown) => console.log(JSON.stringify(payload));
  const drop = () => { };
  return {
    isTTY: false,
    isQuiet: false,
    isJSON: true,
    write: drop,
    info: drop,
    warn: drop,
    error: (line) => print(failurePayload(line)),
    fail: (error, warnings) => print(failurePayload(error, warnings)),
    json: print,
  };
}
