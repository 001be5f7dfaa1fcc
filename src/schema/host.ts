import { z } from 'zod';

/** At least two labels, and a top-level label that is not all digits (rejects 10.0.0.300) */
function isQualified(name: string): boolean {
  const labels = (name.endsWith('.') ? name.slice(0, -1) : name).split('.');
  return labels.length >= 2 && !/^\d+$/.test(labels[labels.length - 1] ?? '');
}

/** IPv4 or IPv6 address, or a fully qualified domain name */
export const HostSchema = z.union([
  z.ipv4(),
  z.ipv6(),
  z.hostname().refine(isQualified, 'expected a fully qualified domain name'),
]);

export function isIpOrFqdn(value: unknown): boolean {
  return HostSchema.safeParse(value).success;
}
