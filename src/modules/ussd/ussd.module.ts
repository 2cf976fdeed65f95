import { Module } from "@nestjs/common";
import { ListingsModule } from "../listings/listings.module";
import { MenuModule } from "../menu/menu.module";
import { SessionsModule } from "../sessions/sessions.module";
import { UssdController } from "./controllers/ussd.controller";
import { InputTokenizerService } from "./services/input-tokenizer.service";
import { ResponseFormatterService } from "./services/response-formatter.service";
import { SessionStateMachineService } from "./services/session-state-machine.service";
import { TerminalEffectsService } from "./services/terminal-effects.service";
import { UssdGatewayService } from "./services/ussd-gateway.service";

@Module({
  imports: [MenuModule, SessionsModule, ListingsModule],
  controllers: [UssdController],
  providers: [
    InputTokenizerService,
    ResponseFormatterService,
    TerminalEffectsService,
    SessionStateMachineService,
    UssdGatewayService,
  ],
  exports: [UssdGatewayService],
})
export class UssdModule {}
