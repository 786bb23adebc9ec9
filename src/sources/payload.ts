/**
 * Owner-level helpers shared by the board collaborators
 */

/**
 * Owner's tenant key: board_token when set, otherwise the last path
 * segment of target_url ("https://boards.greenhouse.io/acme" -> "acme")
 */
export function resolveBoardToken(owner: {
  board_token: string | null;
  target_url: string;
}): string | null {
  const token = owner.board_token?.trim();
  if (token) {
    return token;
  }

  try {
    const segments = new URL(owner.target_url).pathname
      .split("/")
      .filter((segment) => segment.length > 0);
    return segments.length > 0 ? segments[segments.length - 1] : null;
  } catch {
    return null;
  }
}
