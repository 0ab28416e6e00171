import { Controller, Get } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { BaseController } from "@/common/base/base.controller";
import type { AccountStatus } from "@/common/types/gateway";
import { AccountPoolService } from "@/accounts/account-pool.service";
import { ChallengeCacheService, type SiteCacheStatus } from "@/challenge-cache/challenge-cache.service";
import { CheckinService, type CheckinStatus } from "@/checkin/checkin.service";
import { SiteFailoverService, type FailoverStatus } from "@/failover/site-failover.service";
import { ApiKeyValidationService, type ApiKeyValidationStats } from "@/gateway/api-key-validation.service";
import { GatewayRouterService, type RouterStats } from "@/gateway/gateway-router.service";
import { GatewaySchedulerService, type SchedulerStatus } from "@/scheduler/gateway-scheduler.service";
import { ChallengeSessionService, type SessionStats } from "@/session/challenge-session.service";
import { HealthResponseDto } from "./dto/health.dto";

export type GatewayHealthStatus = "healthy" | "degraded" | "unhealthy";

export interface HealthResponse {
  status: GatewayHealthStatus;
  timestamp: number;
  uptime: number;
  activeSite: { name: string; url: string; role: string; requiresChallengeSolution: boolean };
  failover: Omit<FailoverStatus, "activeSite">;
  accounts: { total: number; enabled: number; eligible: number; details: AccountStatus[] };
  cache: Record<string, SiteCacheStatus>;
  session: SessionStats;
  scheduler: SchedulerStatus;
  gateway: RouterStats;
  apiKeyValidation: ApiKeyValidationStats;
  checkin: CheckinStatus;
}

@ApiTags("System Health")
@Controller()
export class HealthController extends BaseController {
  constructor(
    private readonly failover: SiteFailoverService,
    private readonly pool: AccountPoolService,
    private readonly cache: ChallengeCacheService,
    private readonly session: ChallengeSessionService,
    private readonly scheduler: GatewaySchedulerService,
    private readonly router: GatewayRouterService,
    private readonly apiKeyValidation: ApiKeyValidationService,
    private readonly checkin: CheckinService
  ) {
    super();
  }

  @Get("health")
  @ApiOperation({
    summary: "Gateway status",
    description: "Active site, failover state, account health, challenge cache freshness and session liveness",
  })
  @ApiResponse({ status: 200, description: "Status object", type: HealthResponseDto })
  async getHealth(): Promise<HealthResponse> {
    return this.executeOperation(async () => {
      const { activeSite, ...failover } = this.failover.getStatus();
      const accounts = this.pool.getHealthSnapshot();
      const eligible = accounts.filter(account => account.eligible).length;

      let status: GatewayHealthStatus = "healthy";
      if (eligible === 0) {
        status = "unhealthy";
      } else if (failover.mode !== "ON_PRIMARY") {
        status = "degraded";
      }

      return {
        status,
        timestamp: Date.now(),
        uptime: this.getUptime(),
        activeSite: {
          name: activeSite.name,
          url: activeSite.url,
          role: activeSite.role,
          requiresChallengeSolution: activeSite.requiresChallengeSolution,
        },
        failover,
        accounts: {
          total: accounts.length,
          enabled: accounts.filter(account => account.enabled).length,
          eligible,
          details: accounts,
        },
        cache: this.cache.getStats(),
        session: this.session.getStats(),
        scheduler: this.scheduler.getStatus(),
        gateway: this.router.getStats(),
        apiKeyValidation: this.apiKeyValidation.getStats(),
        checkin: this.checkin.getStatus(),
      };
    }, "getHealth");
  }
}
