import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { AccountPoolService } from "./account-pool.service";
import { AccountStoreService } from "./account-store.service";

@Module({
  providers: [
    {
      provide: AccountStoreService,
      useFactory: (config: ConfigService) => new AccountStoreService(config.getAccountsFile()),
      inject: [ConfigService],
    },
    {
      provide: AccountPoolService,
      useFactory: (config: ConfigService, store: AccountStoreService) =>
        new AccountPoolService(store, config.getSettings().pool),
      inject: [ConfigService, AccountStoreService],
    },
  ],
  exports: [AccountStoreService, AccountPoolService],
})
export class AccountsModule {}
