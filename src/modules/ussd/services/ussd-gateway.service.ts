import { Inject, Injectable, Logger } from "@nestjs/common";
import { DependencyError, describeError } from "../../../common/errors/ussd.errors";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";
import { MENU_TREE, MenuTree } from "../../menu/menu-tree";
import { SessionLockService } from "../../sessions/services/session-lock.service";
import { SessionStoreService } from "../../sessions/services/session-store.service";
import { UssdCallback } from "../types/ussd.types";
import { InputTokenizerService } from "./input-tokenizer.service";
import { ResponseFormatterService } from "./response-formatter.service";
import { SessionStateMachineService } from "./session-state-machine.service";

/**
 * One gateway callback end to end: lock, load, replay check, advance, persist,
 * format. Always answers with a valid CON/END body.
 */
@Injectable()
export class UssdGatewayService {
  private readonly logger = new Logger(UssdGatewayService.name);

  constructor(
    private readonly sessionLock: SessionLockService,
    private readonly sessionStore: SessionStoreService,
    private readonly tokenizer: InputTokenizerService,
    private readonly stateMachine: SessionStateMachineService,
    private readonly formatter: ResponseFormatterService,
    @Inject(MENU_TREE) private readonly menuTree: MenuTree,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
  ) {}

  async handleCallback(callback: UssdCallback): Promise<string> {
    const { sessionId, phoneNumber } = callback;

    try {
      return await this.sessionLock.runExclusive(sessionId, phoneNumber, () =>
        this.process(callback),
      );
    } catch (error) {
      if (error instanceof DependencyError) {
        this.logger.warn(`Callback for session ${sessionId} deferred: ${error.message}`);
        return this.formatter.format(this.menuTree.messages.serviceUnavailable, false);
      }

      this.logger.error(
        `Unexpected failure handling session ${sessionId}: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return this.formatter.format(this.menuTree.messages.unexpectedError, false);
    }
  }

  private async process(callback: UssdCallback): Promise<string> {
    const now = new Date();
    const inputKey = this.tokenizer.key(callback.text);
    const { session, expired, created } = await this.sessionStore.loadOrCreate(
      callback.sessionId,
      callback.phoneNumber,
      now,
    );

    // Gateway redelivery of a callback already answered
    if (!created && session.lastInput === inputKey && session.lastDisplay !== null) {
      this.logger.debug(`Replaying response for session ${callback.sessionId}`);
      return this.formatter.format(session.lastDisplay, session.lastContinue);
    }

    const notice =
      expired && this.config.showExpiredNotice ? this.menuTree.messages.sessionExpired : undefined;

    // A new session always opens on the root menu, whatever the dial string carried
    const input = created ? null : this.tokenizer.latest(callback.text);
    const result = await this.stateMachine.advance(session, input, { now, notice });

    result.session.lastInput = inputKey;
    await this.sessionStore.save(result.session);

    this.logger.debug(`Session ${callback.sessionId} now at ${result.session.currentNode}`, {
      status: result.session.status,
      continueSession: result.continueSession,
    });
    return this.formatter.format(result.displayText, result.continueSession);
  }
}
