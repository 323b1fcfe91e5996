/**
 * Header an authenticating proxy in front of the server sets to the signed-in
 * user's id
 */
export const VIEWER_ID_HEADER = 'x-viewer-id';

/**
 * Viewer of a live events request, or `null` when the request is anonymous.
 * Lowercased to match the author ids Postgres returns.
 */
export function resolveViewerId(request: Request): string | null {
  const viewerId = request.headers.get(VIEWER_ID_HEADER)?.trim().toLowerCase();
  return viewerId ? viewerId : null;
}
