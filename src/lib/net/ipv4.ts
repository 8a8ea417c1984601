const DOTTED_QUAD = /^(\d{1,3}\.){3}\d{1,3}$/;

/**
 * Syntactic IPv4 check: four dot-separated decimal octets in 0-255.
 * Reserved, network and broadcast addresses are all accepted; CIDR is not.
 */
export function isValidIPv4(value: string | undefined): boolean {
  if (!value || !DOTTED_QUAD.test(value)) return false;
  return value.split('.').every(part => Number(part) <= 255);
}

// Masks and wildcards share the dotted-quad shape.
export const isValidSubnetMask = isValidIPv4;
