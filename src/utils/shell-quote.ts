// Single quotes stop all interpretation; an embedded quote becomes '\''.
const SAFE_CHARS = /^[a-zA-Z0-9_@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value === "") {
    return "''";
  }
  if (SAFE_CHARS.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(" ");
}
