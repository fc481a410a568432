export interface JsonOutputOptions {
  json?: boolean;
  /** Single-line output, handy when piping into another tool */
  compact?: boolean;
}

export function shouldOutputJson(options: JsonOutputOptions): boolean {
  return options.json === true;
}

export function outputJson(data: unknown, options: JsonOutputOptions = {}): void {
  console.log(options.compact ? JSON.stringify(data) : JSON.stringify(data, null, 2));
}
