/** A gimmick name, or a numeric hash / bdat id */
export type GimmickKey = string | number;

const HASH_LITERAL = /^<([0-9A-F]{8})>$/;

/**
 * `<0012ABCD>` is read as the number 0x0012ABCD; anything else stays a name.
 */
export function parseGimmickKey(text: string): GimmickKey {
  const match = HASH_LITERAL.exec(text);
  if (!match) {
    return text;
  }
  return parseInt(match[1], 16);
}

export function formatHash(value: number): string {
  return `<${value.toString(16).toUpperCase().padStart(8, '0')}>`;
}
