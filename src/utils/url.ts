/**
 * Canonicalizes a user-supplied Portainer URL so that `/api/...` can be appended.
 */

const ORIGIN_PATTERN = /^([a-z][a-z0-9+.-]*:\/\/[^/?#]*)(.*)$/i;

/**
 * Strips the query string, fragment, trailing slashes and any `/api` or `/api/...`
 * suffix from a Portainer URL.
 *
 * Only the path is inspected, so `https://api:9443` keeps its host. The path is cut
 * at the first `/api/` segment, which also truncates a reverse-proxy prefix that
 * happens to contain one (e.g. `/proxy/api/portainer` becomes `/proxy`).
 *
 * Idempotent: normalizing the result again returns it unchanged.
 */
export function normalizePortainerUrl(raw: string): string {
    const trimmed = raw.trim();
    const match = ORIGIN_PATTERN.exec(trimmed);
    const origin = match ? match[1] : '';
    let path = match ? match[2] : trimmed;

    path = path.replace(/[?#].*$/, '');
    path = path.replace(/\/+$/, '');

    const apiSegment = path.indexOf('/api/');
    if (apiSegment !== -1) {
        path = path.substring(0, apiSegment);
    } else if (path.endsWith('/api')) {
        path = path.substring(0, path.length - '/api'.length);
    }

    return origin + path.replace(/\/+$/, '');
}
