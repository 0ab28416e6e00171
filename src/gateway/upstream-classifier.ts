import { Inject, Injectable } from "@nestjs/common";
import { describeError } from "@/common/errors/gateway.errors";
import type { AccountFailureKind, SiteDefinition } from "@/common/types/gateway";
import type { ClassifierSettings } from "@/config/gateway-settings.types";

export const CLASSIFIER_SETTINGS = "CLASSIFIER_SETTINGS";

export type SiteFailureKind = "transport_error" | "challenge_block" | "empty_server_error";

export type UpstreamOutcome =
  | { kind: "success" }
  | { kind: "account"; failure: AccountFailureKind; detail: string }
  | { kind: "site"; failure: SiteFailureKind; detail: string };

export type UpstreamFailure = Exclude<UpstreamOutcome, { kind: "success" }>;

export interface UpstreamObservation {
  status: number;
  contentType?: string;
  /** Body text, only read for non-2xx responses */
  body?: string;
}

/**
 * Decides whether an upstream response is a pass-through result, a problem
 * with the account that made the call, or a problem with the site itself.
 *
 * Rules, first match wins:
 * 1. HTML content type or a block signature in the body: site (`challenge_block`)
 * 2. empty 5xx body from a challenge-protected site: site (`empty_server_error`)
 * 3. 401/403: account (`auth_rejected`)
 * 4. 429, or 5xx with a capacity signature: account (`quota_exhausted`)
 * 5. other 5xx: account (`upstream_error`)
 * 6. anything else: success, returned to the caller unchanged
 *
 * Transport errors are always site-level.
 */
@Injectable()
export class UpstreamClassifier {
  private readonly blockSignatures: readonly string[];
  private readonly capacitySignatures: readonly string[];

  constructor(@Inject(CLASSIFIER_SETTINGS) settings: ClassifierSettings) {
    this.blockSignatures = settings.blockSignatures.map(signature => signature.toLowerCase());
    this.capacitySignatures = settings.capacitySignatures.map(signature => signature.toLowerCase());
  }

  classifyResponse(site: SiteDefinition, observation: UpstreamObservation): UpstreamOutcome {
    const { status } = observation;
    const body = (observation.body ?? "").toLowerCase();

    if (isHtml(observation.contentType)) {
      return { kind: "site", failure: "challenge_block", detail: `HTML response (status ${status})` };
    }

    const signature = this.blockSignatures.find(candidate => body.includes(candidate));
    if (signature) {
      return { kind: "site", failure: "challenge_block", detail: `Block signature "${signature}" (status ${status})` };
    }

    if (status >= 500 && body.trim().length === 0 && site.requiresChallengeSolution) {
      return { kind: "site", failure: "empty_server_error", detail: `Empty ${status} response` };
    }

    if (status === 401 || status === 403) {
      return { kind: "account", failure: "auth_rejected", detail: `Authentication rejected (status ${status})` };
    }

    if (status === 429) {
      return { kind: "account", failure: "quota_exhausted", detail: "Rate limited (status 429)" };
    }

    if (status >= 500) {
      if (this.capacitySignatures.some(candidate => body.includes(candidate))) {
        return { kind: "account", failure: "quota_exhausted", detail: `Account at capacity (status ${status})` };
      }
      return { kind: "account", failure: "upstream_error", detail: `Upstream error (status ${status})` };
    }

    return { kind: "success" };
  }

  classifyTransportError(error: unknown): UpstreamFailure {
    return { kind: "site", failure: "transport_error", detail: describeError(error) };
  }
}

function isHtml(contentType: string | undefined): boolean {
  return contentType !== undefined && contentType.toLowerCase().includes("text/html");
}
