import { Module } from "@nestjs/common";

import { HealthController } from "@/controllers/health.controller";
import { OperationsController } from "@/controllers/operations.controller";

import { ConfigModule } from "@/config/config.module";
import { SessionModule } from "@/session/session.module";
import { ChallengeCacheModule } from "@/challenge-cache/challenge-cache.module";
import { FailoverModule } from "@/failover/failover.module";
import { AccountsModule } from "@/accounts/accounts.module";
import { GatewayModule } from "@/gateway/gateway.module";
import { CheckinModule } from "@/checkin/checkin.module";
import { SchedulerModule } from "@/scheduler/scheduler.module";

@Module({
  imports: [
    ConfigModule,
    SessionModule,
    ChallengeCacheModule,
    FailoverModule,
    AccountsModule,
    // Registers the catch-all under the API prefix
    GatewayModule,
    CheckinModule,
    SchedulerModule,
  ],
  controllers: [HealthController, OperationsController],
})
export class AppModule {}
