import { Module } from "@nestjs/common";
import { DatabaseModule } from "../../database/database.module";
import { MenuModule } from "../menu/menu.module";
import { UssdSessionRepository } from "./repositories/ussd-session.repository";
import { SessionLockService } from "./services/session-lock.service";
import { SessionStoreService } from "./services/session-store.service";

@Module({
  imports: [DatabaseModule, MenuModule],
  providers: [UssdSessionRepository, SessionStoreService, SessionLockService],
  exports: [SessionStoreService, SessionLockService],
})
export class SessionsModule {}
