import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { SessionModule } from "@/session/session.module";
import { CHALLENGE_CACHE_SETTINGS, ChallengeCacheService } from "./challenge-cache.service";

@Module({
  imports: [SessionModule],
  providers: [
    {
      provide: CHALLENGE_CACHE_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().cache,
      inject: [ConfigService],
    },
    ChallengeCacheService,
  ],
  exports: [ChallengeCacheService, SessionModule],
})
export class ChallengeCacheModule {}
