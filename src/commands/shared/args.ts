export function makeError(code: string, message: string): Error {
  return new Error(`${code}: ${message}`);
}

export function readValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw makeError("E_ARG_REQUIRED", flag);
  }

  return value;
}

/**
 * Collects every token after `flag` up to the next option. Values may be
 * space-separated, comma-separated or both.
 */
export function readList(argv: string[], index: number, flag: string): { values: string[]; nextIndex: number } {
  const values: string[] = [];
  let cursor = index + 1;

  while (cursor < argv.length) {
    const token = argv[cursor] ?? "";
    if (token.startsWith("--")) {
      break;
    }

    values.push(...splitList(token));
    cursor += 1;
  }

  if (values.length === 0) {
    throw makeError("E_ARG_REQUIRED", flag);
  }

  return { values, nextIndex: cursor - 1 };
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parsePositiveInt(value: string, optionName: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) <= 0) {
    throw makeError("E_ARG_INVALID", `${optionName} must be a positive integer`);
  }

  return Number(value);
}

export function parsePort(value: string, optionName: string): number {
  const port = parsePositiveInt(value, optionName);
  if (port > 65_535) {
    throw makeError("E_ARG_INVALID", `${optionName} must be between 1 and 65535`);
  }

  return port;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
