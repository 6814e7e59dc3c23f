export function canonicalUrl(href: string, baseUrl: string): string | undefined {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(javascript|mailto|tel|data):/i.test(trimmed)) {
    return undefined;
  }

  try {
    const resolved = new URL(trimmed, baseUrl);
    resolved.hash = '';
    return resolved.toString();
  } catch {
    return undefined;
  }
}

export function pathSegmentAfter(url: string, marker: string): string | undefined {
  const index = url.indexOf(marker);
  if (index === -1) return undefined;

  const rest = url.slice(index + marker.length).split(/[/?#]/)[0];
  return rest ? decodeURIComponent(rest) : undefined;
}

export function titleCaseSlug(slug: string): string {
  return slug
    .split(/[-_]+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

export function withPageParam(url: string, page: number): string {
  return `${url}${url.includes('?') ? '&' : '?'}page=${page}`;
}
