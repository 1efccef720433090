/**
 * Memory location as printed by the debugger, e.g. `0x401020 <main+16>`.
 */
export type Address = string;

const CANONICAL_ADDRESS = /^0[xX][0-9a-fA-F]+/;

/**
 * Returns the canonical hexadecimal prefix of `raw`, dropping any symbol
 * annotation the debugger appended. Input without a `0x` prefix is returned
 * trimmed but otherwise unchanged.
 * @example
 * ```typescript
 * cleanAddress('0x401020 <main+16>'); // '0x401020'
 * cleanAddress('0x1a2b');             // '0x1a2b'
 * ```
 */
export function cleanAddress(raw: Address): Address {
  const trimmed = raw.trim();
  const match = CANONICAL_ADDRESS.exec(trimmed);
  return match ? match[0] : trimmed;
}
