import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { CheckinModule } from "@/checkin/checkin.module";
import { FailoverModule } from "@/failover/failover.module";
import { GatewaySchedulerService, SCHEDULER_SETTINGS } from "./gateway-scheduler.service";

@Module({
  imports: [FailoverModule, CheckinModule],
  providers: [
    {
      provide: SCHEDULER_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().scheduler,
      inject: [ConfigService],
    },
    GatewaySchedulerService,
  ],
  exports: [GatewaySchedulerService],
})
export class SchedulerModule {}
