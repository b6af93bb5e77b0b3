export function getDisplayTitle(url: string, title?: string): string {
  const normalizedTitle = title?.trim();
  if (normalizedTitle) return normalizedTitle;
  if (!url || url === 'about:blank') return 'New Tab';

  try {
    const parsed = new URL(url);
    return parsed.hostname || url;
  } catch {
    return url;
  }
}

export function getDisplayAddress(url: string): string {
  return url === 'about:blank' ? '' : url;
}

export function getDisplayHost(url: string): string {
  try {
    return new URL(url).host || url;
  } catch {
    return url;
  }
}
