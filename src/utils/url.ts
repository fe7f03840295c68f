export interface LinkBases {
  baseDomain: string;
  relativeLinkBase?: string;
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

export function resolveJobLink(rawHref: string | undefined, bases: LinkBases): string | null {
  const href = rawHref?.trim() ?? '';
  if (!href) {
    return null;
  }
  if (href.toLowerCase().startsWith('http')) {
    return href;
  }

  const domain = trimTrailingSlash(bases.baseDomain);
  if (href.startsWith('/')) {
    return `${domain}${href}`;
  }

  const relativeBase = trimTrailingSlash(bases.relativeLinkBase ?? domain);
  return `${relativeBase}/${href}`;
}

