/** 100ns intervals between the Gregorian epoch (1582-10-15) and the Unix epoch */
const GREGORIAN_OFFSET = 122_192_928_000_000_000n;
const TICKS_PER_MS = 10_000n;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Creation time embedded in a time-based UUID
 *
 * Versions 1 and 6 carry a 60-bit Gregorian timestamp, version 7 a 48-bit
 * Unix millisecond timestamp. Precision is truncated to milliseconds.
 *
 * @returns `null` for malformed ids and versions without a timestamp
 */
export function timestampFromUuid(id: string): Date | null {
  if (!UUID_PATTERN.test(id)) {
    return null;
  }

  const hex = id.replace(/-/g, '');
  switch (hex[12]) {
    case '7':
      return new Date(Number.parseInt(hex.slice(0, 12), 16));
    case '1': {
      const ticks =
        (BigInt(`0x${hex.slice(13, 16)}`) << 48n) |
        (BigInt(`0x${hex.slice(8, 12)}`) << 32n) |
        BigInt(`0x${hex.slice(0, 8)}`);
      return fromGregorianTicks(ticks);
    }
    case '6': {
      const ticks =
        (BigInt(`0x${hex.slice(0, 8)}`) << 28n) |
        (BigInt(`0x${hex.slice(8, 12)}`) << 12n) |
        BigInt(`0x${hex.slice(13, 16)}`);
      return fromGregorianTicks(ticks);
    }
    default:
      return null;
  }
}

function fromGregorianTicks(ticks: bigint): Date {
  return new Date(Number((ticks - GREGORIAN_OFFSET) / TICKS_PER_MS));
}
