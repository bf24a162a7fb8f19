export interface Presenter {
  isTTY: boolean;
  isQuiet: boolean;
  isJSON: boolean;
  write(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
  /** Report the error that ends the command; `warnings` only reach JSON output. */
  fail(error: unknown, warnings?: readonly string[]): void;
  json(payload: unknown): void;
}
