export type InventoryParseErrorCode = "table_not_found" | "malformed_row" | "missing_set_name";

export class HttpStatusError extends Error {
  public readonly status: number;
  public readonly url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} while fetching ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export class EmptyResponseError extends Error {
  public readonly url: string;

  constructor(url: string) {
    super(`Empty response body from ${url}`);
    this.name = "EmptyResponseError";
    this.url = url;
  }
}

/**
 * Raised by the inventory extractor. `line` carries the offending table row
 * for `malformed_row`.
 */
export class InventoryParseError extends Error {
  public readonly code: InventoryParseErrorCode;
  public readonly line?: string;

  constructor(code: InventoryParseErrorCode, options: { line?: string; cause?: unknown } = {}) {
    super(options.line ? `${code}: ${options.line}` : code, { cause: options.cause });
    this.name = "InventoryParseError";
    this.code = code;
    this.line = options.line;
  }
}

export class ColorGuideError extends Error {
  public readonly code: "table_not_found";

  constructor(code: "table_not_found", url?: string) {
    super(url ? `${code}: ${url}` : code);
    this.name = "ColorGuideError";
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
