import { createHash } from 'node:crypto';

const GUID_MODULUS = 10n ** 16n;

export function guidFromUrl(url: string): string {
  const digest = createHash('md5').update(url, 'utf8').digest('hex');
  return (BigInt(`0x${digest.slice(0, 16)}`) % GUID_MODULUS).toString();
}
