const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * Parses a hexadecimal address as sent to `/goto`, with or without the
 * `0x` prefix.
 * @returns the address, or undefined when `raw` is not hexadecimal
 */
export function parseViewerAddress(raw: string): bigint | undefined {
  const trimmed = raw.trim();
  const digits = /^0[xX]/.test(trimmed) ? trimmed.slice(2) : trimmed;
  if (!HEX_DIGITS.test(digits)) {
    return undefined;
  }
  return BigInt(`0x${digits}`);
}

export function formatViewerAddress(address: bigint): string {
  return `0x${address.toString(16)}`;
}
