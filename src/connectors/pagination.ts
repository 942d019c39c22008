const LINK_NEXT = /<([^>]+)>;\s*rel="next"/;
const LINK_LAST = /<([^>]+)>;\s*rel="last"/;

/**
 * Resolve the next page URL from an RFC 8288 Link header.
 *
 * Returns undefined when there is no "last" link or when the current URL
 * is already the last page, whatever "next" says.
 */
export function nextPageURL(currentURL: string, linkHeader: string | null): string | undefined {
  if (!linkHeader) {
    return undefined;
  }

  const last = LINK_LAST.exec(linkHeader)?.[1];
  if (last === undefined || last === currentURL) {
    return undefined;
  }

  return LINK_NEXT.exec(linkHeader)?.[1];
}
