const TRUE_VALUES: ReadonlyArray<unknown> = ["true", "True", true];

/**
 * Only `"true"`, `"True"` and `true` count as true. Existing config files
 * rely on `"1"`, `"yes"` and `"TRUE"` being false.
 */
export function parseBool(value: unknown): boolean {
  return TRUE_VALUES.includes(value);
}

export function parseMode(value: string): string {
  if (!/^[0-7]{3,4}$/.test(value)) {
    throw new Error(`Invalid mode: ${value}. Use 3 or 4 octal digits, e.g. 644.`);
  }
  return value;
}
