/**
 * Asset URL rewriting
 *
 * Bodies reference shared files relative to the repository
 * (`src="../assets/img/map.png"`). The platform serves them from
 * `<assetBaseUrl>/<scope>/`.
 */

const ASSET_REFERENCE_PATTERN = /((?:src|href)\s*=\s*["'])(?:\.\.\/)*assets\//gi;

/**
 * Base URL under which a scope's assets are served
 */
export function assetUrlFor(assetBaseUrl: string, scope: string): string {
  return `${assetBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(scope)}`;
}

/**
 * Replace `src`/`href` references to `assets/` (with any number of `../`
 * prefixes) by the served location
 */
export function rewriteAssetUrls(body: string, baseUrl: string): string {
  return body.replace(ASSET_REFERENCE_PATTERN, (_match, attribute: string) => `${attribute}${baseUrl}/`);
}

/**
 * Path of an asset relative to the `assets/` directory
 */
export function assetKey(repoPath: string): string {
  return repoPath.replace(/^assets\//, '');
}
