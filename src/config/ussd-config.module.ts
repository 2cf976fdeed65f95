import { Global, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { USSD_CONFIG, ussdConfigFactory } from "./ussd.config";

@Global()
@Module({
  providers: [
    {
      provide: USSD_CONFIG,
      useFactory: ussdConfigFactory,
      inject: [ConfigService],
    },
  ],
  exports: [USSD_CONFIG],
})
export class UssdConfigModule {}
