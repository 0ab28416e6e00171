export type SiteRole = "primary" | "backup";

/**
 * An upstream site. Loaded once from the sites file and never mutated.
 */
export interface SiteDefinition {
  readonly name: string;
  readonly url: string;
  readonly role: SiteRole;
  readonly requiresProxy: boolean;
  readonly requiresChallengeSolution: boolean;
  /** Order among backups, lowest first */
  readonly priority: number;
  /** Page that carries the anti-bot challenge */
  readonly challengePath: string;
  /** Cookie names a solve must yield to count as successful */
  readonly requiredCookies: readonly string[];
}

export interface ProxySettings {
  readonly protocol: "http" | "https";
  readonly host: string;
  readonly port: number;
}
