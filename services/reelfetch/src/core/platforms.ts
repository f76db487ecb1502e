interface PlatformRule {
  label: string;
  hosts: readonly string[];
  pathIncludes?: string;
}

const PLATFORM_RULES: readonly PlatformRule[] = [
  { label: 'YouTube', hosts: ['youtube.com', 'youtu.be'] },
  { label: 'Instagram', hosts: ['instagram.com'] },
  { label: 'TikTok', hosts: ['tiktok.com'] },
  { label: 'Facebook', hosts: ['facebook.com', 'fb.watch'] },
  { label: 'Twitter/X', hosts: ['twitter.com', 'x.com'] },
  { label: 'Reddit', hosts: ['reddit.com', 'v.redd.it'] },
  { label: 'Threads', hosts: ['threads.net'] },
  { label: 'Pinterest', hosts: ['pinterest.com', 'pin.it'] },
  { label: 'LinkedIn', hosts: ['linkedin.com'], pathIncludes: '/feed/update/' },
  { label: 'Twitch', hosts: ['twitch.tv'] },
  { label: 'Vimeo', hosts: ['vimeo.com'] },
  { label: 'Streamable', hosts: ['streamable.com'] },
  { label: 'Bilibili', hosts: ['bilibili.com', 'bilibili.tv'] },
  { label: 'Odysee', hosts: ['odysee.com'] },
  { label: 'Rumble', hosts: ['rumble.com'] },
];

export function hostMatches(hostname: string, domain: string): boolean {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  const target = domain.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}

/** Human-readable label for the site a source URL points at. */
export function detectPlatform(url: URL): string {
  const path = url.pathname.toLowerCase();
  for (const rule of PLATFORM_RULES) {
    if (!rule.hosts.some((domain) => hostMatches(url.hostname, domain))) continue;
    if (rule.pathIncludes && !path.includes(rule.pathIncludes)) continue;
    return rule.label;
  }
  return 'Generic';
}

export function isHostAllowed(url: URL, allowlist: readonly string[]): boolean {
  if (allowlist.length === 0) return true;
  return allowlist.some((domain) => hostMatches(url.hostname, domain));
}

export function parseSourceUrl(sourceRef: string): URL | undefined {
  let parsed: URL;
  try {
    parsed = new URL(sourceRef.trim());
  } catch {
    return undefined;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return undefined;
  return parsed;
}
