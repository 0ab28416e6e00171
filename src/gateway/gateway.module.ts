import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { AccountsModule } from "@/accounts/accounts.module";
import { FailoverModule } from "@/failover/failover.module";
import { API_KEY_VALIDATION_SETTINGS, ApiKeyValidationService } from "./api-key-validation.service";
import { ApiKeyGuard } from "./api-key.guard";
import { GatewayController } from "./gateway.controller";
import { GatewayRouterService, ROUTER_SETTINGS } from "./gateway-router.service";
import { CLASSIFIER_SETTINGS, UpstreamClassifier } from "./upstream-classifier";
import { AxiosUpstreamTransport, UPSTREAM_TRANSPORT } from "./upstream.transport";

@Module({
  imports: [AccountsModule, FailoverModule],
  controllers: [GatewayController],
  providers: [
    {
      provide: CLASSIFIER_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().classifier,
      inject: [ConfigService],
    },
    {
      provide: ROUTER_SETTINGS,
      useFactory: (config: ConfigService) => ({ ...config.getSettings().router, ...config.getSettings().upstream }),
      inject: [ConfigService],
    },
    {
      provide: API_KEY_VALIDATION_SETTINGS,
      useFactory: (config: ConfigService) => config.getSettings().apiKeyValidation,
      inject: [ConfigService],
    },
    {
      provide: UPSTREAM_TRANSPORT,
      useClass: AxiosUpstreamTransport,
    },
    UpstreamClassifier,
    GatewayRouterService,
    ApiKeyValidationService,
    ApiKeyGuard,
  ],
  exports: [GatewayRouterService, ApiKeyValidationService, AccountsModule, FailoverModule],
})
export class GatewayModule {}
