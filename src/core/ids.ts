import { ulid } from "ulid";

export type RunId = `run_${string}`;
export type TxId = `tx_${string}`;

const CROCKFORD = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

export function newTxId(): TxId {
  return `tx_${ulid()}`;
}

/** 26 Crockford base32 characters for 128 bits, the same alphabet and width as a ULID. */
export function crockfordBase32(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let value = 0n;
  for (const b of bytes) value = (value << 8n) | BigInt(b);

  const chars: string[] = [];
  for (let i = 0; i < 26; i++) {
    chars.unshift(CROCKFORD.charAt(Number(value & 31n)));
    value >>= 5n;
  }
  return chars.join("");
}
