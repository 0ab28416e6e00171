/**
 * Cookie name to value
 */
export type CookieMap = Readonly<Record<string, string>>;

export type ChallengeEntryState = "empty" | "valid" | "expiring" | "expired" | "refreshing";

/**
 * A solved challenge. Entries are frozen and replaced whole, never edited.
 */
export interface ChallengeCacheEntry {
  readonly site: string;
  readonly cookies: CookieMap;
  readonly solvedAt: number;
  readonly expiresAt: number;
  readonly refreshDeadline: number;
}
