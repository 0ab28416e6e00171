import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { AccountsModule } from "@/accounts/accounts.module";
import { FailoverModule } from "@/failover/failover.module";
import { CHECKIN_SETTINGS, CheckinService } from "./checkin.service";

@Module({
  imports: [AccountsModule, FailoverModule],
  providers: [
    {
      provide: CHECKIN_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().checkin,
      inject: [ConfigService],
    },
    CheckinService,
  ],
  exports: [CheckinService],
})
export class CheckinModule {}
