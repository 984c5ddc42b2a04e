export interface CidrBlock {
  cidr: string;
  /** First address as an unsigned 32-bit integer */
  start: number;
  /** Last address, inclusive */
  end: number;
  prefixLength: number;
}

const CIDR_PATTERN = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/;

/**
 * Parse an IPv4 CIDR block. Returns null for anything that is not one,
 * including blocks with host bits set (10.0.0.1/24).
 */
export function parseCidr(cidr: string): CidrBlock | null {
  const match = CIDR_PATTERN.exec(cidr.trim());
  if (!match) {
    return null;
  }

  const octets = match.slice(1, 5).map(Number);
  const prefixLength = Number(match[5]);
  if (octets.some(octet => octet > 255) || prefixLength > 32) {
    return null;
  }

  const address = octets.reduce((value, octet) => value * 256 + octet, 0);
  const size = 2 ** (32 - prefixLength);
  if (address % size !== 0) {
    return null;
  }

  return { cidr, start: address, end: address + size - 1, prefixLength };
}

export function contains(outer: CidrBlock, inner: CidrBlock): boolean {
  return inner.start >= outer.start && inner.end <= outer.end;
}

export function overlaps(a: CidrBlock, b: CidrBlock): boolean {
  return a.start <= b.end && b.start <= a.end;
}
