import { run } from "./index";

run(process.argv.slice(2)).then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    process.stderr.write(`qprof: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  },
);
