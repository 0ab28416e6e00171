import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { BROWSER_LAUNCHER } from "./browser-launcher";
import { ChallengeSessionService, SESSION_SETTINGS } from "./challenge-session.service";
import { PlaywrightBrowserLauncher } from "./playwright-browser.launcher";

@Module({
  providers: [
    {
      provide: SESSION_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().session,
      inject: [ConfigService],
    },
    {
      provide: BROWSER_LAUNCHER,
      useFactory: (config: ConfigService) => new PlaywrightBrowserLauncher(config.getSettings().upstream.userAgent),
      inject: [ConfigService],
    },
    ChallengeSessionService,
  ],
  exports: [ChallengeSessionService],
})
export class SessionModule {}
