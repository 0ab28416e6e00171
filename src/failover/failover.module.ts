import { Module } from "@nestjs/common";
import { ChallengeCacheModule } from "@/challenge-cache/challenge-cache.module";
import { ConfigService } from "@/config/config.service";
import { FAILOVER_SETTINGS, SiteFailoverService } from "./site-failover.service";
import { HttpSiteHealthProbe, SITE_HEALTH_PROBE } from "./site-health.probe";

@Module({
  imports: [ChallengeCacheModule],
  providers: [
    {
      provide: FAILOVER_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().failover,
      inject: [ConfigService],
    },
    {
      provide: SITE_HEALTH_PROBE,
      useFactory: (config: ConfigService) => new HttpSiteHealthProbe(config.getSettings().probe),
      inject: [ConfigService],
    },
    SiteFailoverService,
  ],
  exports: [SiteFailoverService, ChallengeCacheModule],
})
export class FailoverModule {}
