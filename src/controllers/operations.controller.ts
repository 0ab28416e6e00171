import { ConflictException, Controller, HttpCode, Post, ServiceUnavailableException } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import { CacheError, GatewayError, SessionError, SiteExhaustedError } from "@/common/errors/gateway.errors";
import { AccountPoolService } from "@/accounts/account-pool.service";
import { ChallengeCacheService } from "@/challenge-cache/challenge-cache.service";
import { CheckinService, type CheckinRunResult } from "@/checkin/checkin.service";
import { SiteFailoverService } from "@/failover/site-failover.service";
import { ApiKeyValidationService } from "@/gateway/api-key-validation.service";
import { ChallengeSessionService } from "@/session/challenge-session.service";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import { OperationResultDto } from "./dto/operation-result.dto";

export interface OperationResult {
  success: boolean;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Operator controls. Each endpoint triggers one public operation of a core component.
 */
@ApiTags("Operations")
@Controller()
export class OperationsController extends BaseController {
  constructor(
    private readonly failover: SiteFailoverService,
    private readonly cache: ChallengeCacheService,
    private readonly session: ChallengeSessionService,
    private readonly pool: AccountPoolService,
    private readonly apiKeyValidation: ApiKeyValidationService,
    private readonly checkin: CheckinService
  ) {
    super();
  }

  @Post("refresh-challenge")
  @HttpCode(200)
  @ApiOperation({ summary: "Solve the active site's challenge again now" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  @ApiResponse({ status: 503, type: HttpErrorResponseDto })
  async refreshChallenge(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      const site = this.failover.active();
      if (!site.requiresChallengeSolution) {
        return { success: true, message: `${site.name} needs no challenge solution` };
      }

      try {
        const cookies = await this.cache.forceRefresh(site);
        return {
          success: true,
          message: `Challenge cookies refreshed for ${site.name}`,
          data: { site: site.name, cookieNames: Object.keys(cookies), state: this.cache.getEntryState(site) },
        };
      } catch (error) {
        if (error instanceof CacheError) {
          throw new GatewayError("challenge_unavailable", `Challenge refresh failed for ${site.name}`, error);
        }
        throw error;
      }
    }, "refreshChallenge");
  }

  @Post("restart-session")
  @HttpCode(200)
  @ApiOperation({ summary: "Tear down and relaunch the automation session" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  @ApiResponse({ status: 503, type: HttpErrorResponseDto })
  async restartSession(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      try {
        await this.session.restart();
      } catch (error) {
        if (error instanceof SessionError) {
          throw new ServiceUnavailableException(`Session restart failed: ${error.message}`);
        }
        throw error;
      }
      return { success: true, message: "Automation session restarted", data: { ...this.session.getStats() } };
    }, "restartSession");
  }

  @Post("switch-to-primary")
  @HttpCode(200)
  @ApiOperation({ summary: "Probe the primary site once and switch to it when healthy" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  async switchToPrimary(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      if (this.failover.isOnPrimary()) {
        return { success: true, message: "Already on the primary site" };
      }

      const { switched, probe } = await this.failover.switchToPrimary();
      return {
        success: switched,
        message: switched
          ? "Switched to the primary site"
          : `Primary site is not healthy (${probe?.outcome ?? "not probed"}), staying on ${this.failover.active().name}`,
        data: probe ? { probe } : undefined,
      };
    }, "switchToPrimary");
  }

  @Post("force-switch-to-primary")
  @HttpCode(200)
  @ApiOperation({ summary: "Switch to the primary site without probing it" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  async forceSwitchToPrimary(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      const switched = this.failover.forceSwitchToPrimary();
      return {
        success: true,
        message: switched ? "Forced switch to the primary site" : "Already on the primary site",
        data: { switched },
      };
    }, "forceSwitchToPrimary");
  }

  @Post("switch-site")
  @HttpCode(200)
  @ApiOperation({ summary: "Move to the next backup site" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  @ApiResponse({ status: 409, description: "No backup site left", type: HttpErrorResponseDto })
  async switchSite(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      const from = this.failover.active().name;
      try {
        const site = this.failover.switchToNext("operator request");
        return { success: true, message: `Switched from ${from} to ${site.name}`, data: { from, to: site.name } };
      } catch (error) {
        if (error instanceof SiteExhaustedError) {
          throw new ConflictException(`No backup site left after ${from}`);
        }
        throw error;
      }
    }, "switchSite");
  }

  @Post("clear-api-key-cache")
  @HttpCode(200)
  @ApiOperation({ summary: "Forget cached client API key verdicts" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  async clearApiKeyCache(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      const cleared = this.apiKeyValidation.clear();
      return { success: true, message: `Cleared ${cleared} cached API key verdicts`, data: { cleared } };
    }, "clearApiKeyCache");
  }

  @Post("reload")
  @HttpCode(200)
  @ApiOperation({ summary: "Re-read account definitions; session, cache and failover state are kept" })
  @ApiResponse({ status: 200, type: OperationResultDto })
  @ApiResponse({ status: 500, description: "Accounts file is invalid", type: HttpErrorResponseDto })
  async reload(): Promise<OperationResult> {
    return this.executeOperation(async () => {
      const summary = this.pool.reloadAccounts();
      return { success: true, message: `Reloaded ${summary.total} accounts`, data: { ...summary } };
    }, "reload");
  }

  @Post("checkin")
  @HttpCode(200)
  @ApiOperation({ summary: "Run the account check-in now" })
  async runCheckin(): Promise<CheckinRunResult> {
    return this.executeOperation(() => this.checkin.runForAllAccounts(), "runCheckin", 60_000);
  }
}
