// Canonical JSON as TUF signs it (http://wiki.laptop.org/go/Canonical_JSON):
// no whitespace, object keys sorted by UTF-16 code unit, integers only, and
// only `"` and `\` escaped inside strings.

function quote(text: string): string {
  return `"${text.replace(/["\\]/g, (char) => `\\${char}`)}"`;
}

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function canonicalize(value: unknown): string {
  switch (typeof value) {
    case "string":
      return quote(value);
    case "boolean":
      return String(value);
    case "number":
      if (!Number.isSafeInteger(value)) {
        throw new TypeError(`cannot encode non-integer number ${value}`);
      }
      return String(value);
    case "object": {
      if (value === null) {
        return "null";
      }
      if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => canonicalize(item)).join(",")}]`;
      }
      const members = Object.entries(value)
        .sort(compareKeys)
        .map(([key, member]) => `${quote(key)}:${canonicalize(member)}`);
      return `{${members.join(",")}}`;
    }
    default:
      throw new TypeError(`cannot encode ${typeof value}`);
  }
}
