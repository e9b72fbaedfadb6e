/**
 * Check if a URL points at a remote HTTP(S) resource
 *
 * @example
 * isRemoteUrl("https://example.com/logo.png") // true
 * isRemoteUrl("images/logo.png") // false
 * isRemoteUrl("data:image/png;base64,AAAA") // false
 */
export function isRemoteUrl(url: string): boolean {
  if (!/^https?:\/\//i.test(url.trim())) {
    return false;
  }
  try {
    const parsed = new URL(url.trim());
    return parsed.hostname.length > 0;
  } catch {
    return false;
  }
}
