import { Inject, Injectable, Logger } from "@nestjs/common";
import { InputValidationError } from "../../../common/errors/ussd.errors";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";
import { ListingsService } from "../../listings/listings.service";
import { ListingPage, composeCategory } from "../../listings/types/listing.types";
import { MENU_TREE, MenuTree } from "../../menu/menu-tree";
import { renderTemplate, validateInput } from "../../menu/menu-validators";
import {
  BACK_INPUT,
  InteractiveNode,
  ListingPageNode,
  NEXT_PAGE_INPUT,
  NODE_TYPES,
  TerminalNode,
} from "../../menu/types/menu.types";
import {
  SESSION_STATUS,
  SessionHistoryEntry,
  UssdSession,
  cloneSession,
  createFreshSession,
} from "../../sessions/types/session.types";
import { AdvanceOptions, AdvanceResult } from "../types/ussd.types";
import { CONTINUE_MARKER } from "./response-formatter.service";
import { TerminalEffectsService, describeContact } from "./terminal-effects.service";

const MIN_DESCRIPTION_LENGTH = 10;
const ELLIPSIS = "...";

interface Screen {
  text: string;
  continueSession: boolean;
}

type Transition =
  | { kind: "move"; next: string; field?: string; value: string }
  | { kind: "stay" };

/**
 * Advances one session by one input. Sessions are never mutated in place: each
 * call works on a copy and returns it with the screen to show.
 */
@Injectable()
export class SessionStateMachineService {
  private readonly logger = new Logger(SessionStateMachineService.name);

  constructor(
    @Inject(MENU_TREE) private readonly menuTree: MenuTree,
    @Inject(USSD_CONFIG) private readonly config: UssdConfig,
    private readonly listingsService: ListingsService,
    private readonly terminalEffects: TerminalEffectsService,
  ) {}

  async advance(
    session: UssdSession,
    rawInput: string | null,
    options: AdvanceOptions = {},
  ): Promise<AdvanceResult> {
    const now = options.now ?? new Date();

    // A finished dialog replays its final screen; side effects never run twice
    if (session.status === SESSION_STATUS.COMPLETED && session.lastDisplay !== null) {
      const replay = cloneSession(session);
      replay.lastSeenAt = now;
      return { session: replay, displayText: session.lastDisplay, continueSession: false };
    }

    let working: UssdSession;
    let input = rawInput;

    if (session.status === SESSION_STATUS.ACTIVE) {
      working = cloneSession(session);
    } else {
      this.logger.debug(`Session ${session.sessionId} is ${session.status}, starting over`);
      working = createFreshSession(session.sessionId, session.callerId, this.menuTree.root, now);
      input = null;
    }

    const screen = input === null ? await this.render(working) : await this.consume(working, input);
    const displayText = options.notice ? `${options.notice}\n${screen.text}` : screen.text;

    working.lastDisplay = displayText;
    working.lastContinue = screen.continueSession;
    working.lastSeenAt = now;

    return { session: working, displayText, continueSession: screen.continueSession };
  }

  private async consume(session: UssdSession, input: string): Promise<Screen> {
    const messages = this.menuTree.messages;

    if (this.config.exitInputs.includes(input)) {
      session.status = SESSION_STATUS.ABANDONED;
      this.logger.debug(`Session ${session.sessionId} exited at ${session.currentNode}`);
      return { text: messages.goodbye, continueSession: false };
    }

    const node = this.menuTree.getNode(session.currentNode);
    if (node.type === NODE_TYPES.TERMINAL) {
      return this.enterTerminal(session, node);
    }

    if (input === BACK_INPUT && node.back && session.history.length > 0) {
      return this.goBack(session);
    }

    let transition: Transition;
    try {
      transition = await this.resolve(session, node, input);
    } catch (error) {
      if (!(error instanceof InputValidationError)) {
        throw error;
      }
      return this.reject(session, error);
    }

    session.retryCount = 0;

    if (transition.kind === "stay") {
      return this.render(session);
    }

    if (transition.field) {
      // Re-inserting keeps key order equal to visitation order
      delete session.collectedFields[transition.field];
      session.collectedFields[transition.field] = transition.value;
    }

    const entry: SessionHistoryEntry = transition.field
      ? { nodeId: node.id, field: transition.field }
      : { nodeId: node.id };
    session.history.push(entry);
    session.currentNode = transition.next;
    session.page = 0;

    const target = this.menuTree.getNode(transition.next);
    if (target.type === NODE_TYPES.TERMINAL) {
      return this.enterTerminal(session, target);
    }
    return this.render(session);
  }

  /** Works out where valid input leads; throws InputValidationError otherwise */
  private async resolve(
    session: UssdSession,
    node: InteractiveNode,
    input: string,
  ): Promise<Transition> {
    const messages = this.menuTree.messages;

    switch (node.type) {
      case NODE_TYPES.MENU: {
        const choice = node.choices.find((candidate) => candidate.input === input);
        if (!choice) {
          throw new InputValidationError(messages.invalidChoice, node.id);
        }
        return { kind: "move", next: choice.next, field: node.field, value: choice.value ?? choice.label };
      }

      case NODE_TYPES.INPUT: {
        const outcome = validateInput(node.validator, input);
        if (!outcome.valid) {
          throw new InputValidationError(outcome.message, node.id);
        }
        return { kind: "move", next: node.next, field: node.field, value: outcome.value };
      }

      case NODE_TYPES.LISTING_PAGE: {
        // Listings may change between turns, so choices are recomputed on every visit
        const page = await this.browse(session, node);
        if (input === NEXT_PAGE_INPUT && page.hasMore) {
          session.page += 1;
          return { kind: "stay" };
        }

        const visible = this.fitListings(session, node, page).length;
        const index = /^\d+$/.test(input) ? Number(input) - 1 : -1;
        const item = index < visible ? page.items[index] : undefined;
        if (!item) {
          throw new InputValidationError(messages.invalidChoice, node.id);
        }
        return { kind: "move", next: node.next, field: node.field, value: item.id };
      }
    }
  }

  private async reject(session: UssdSession, error: InputValidationError): Promise<Screen> {
    session.retryCount += 1;

    if (session.retryCount > this.config.maxValidationRetries) {
      session.status = SESSION_STATUS.ABANDONED;
      this.logger.log(
        `Session ${session.sessionId} abandoned after ${session.retryCount} invalid inputs at ${error.nodeId}`,
      );
      return { text: this.menuTree.messages.tooManyAttempts, continueSession: false };
    }

    const screen = await this.render(session);
    return { text: `${error.message}\n${screen.text}`, continueSession: true };
  }

  private async goBack(session: UssdSession): Promise<Screen> {
    const entry = session.history.pop();
    if (!entry) {
      return this.render(session);
    }

    if (entry.field) {
      delete session.collectedFields[entry.field];
    }
    session.currentNode = entry.nodeId;
    session.retryCount = 0;
    session.page = 0;
    return this.render(session);
  }

  private async enterTerminal(session: UssdSession, node: TerminalNode): Promise<Screen> {
    const result = await this.terminalEffects.run(node.effect, session);

    if (!result.ok) {
      session.status = SESSION_STATUS.ABANDONED;
      return { text: result.message, continueSession: false };
    }

    session.status =
      node.outcome === "abandoned" ? SESSION_STATUS.ABANDONED : SESSION_STATUS.COMPLETED;
    this.logger.log(`Session ${session.sessionId} finished at ${node.id} (${session.status})`);

    return {
      text: renderTemplate(node.prompt, { ...session.collectedFields, ...result.values }),
      continueSession: false,
    };
  }

  private async render(session: UssdSession): Promise<Screen> {
    const node = this.menuTree.getNode(session.currentNode);
    const fields = session.collectedFields;
    const messages = this.menuTree.messages;
    const lines = [renderTemplate(node.prompt, fields)];

    switch (node.type) {
      case NODE_TYPES.MENU:
        lines.push(...node.choices.map((choice) => `${choice.input}. ${choice.label}`));
        break;

      case NODE_TYPES.INPUT:
        break;

      case NODE_TYPES.LISTING_PAGE: {
        const page = await this.browse(session, node);
        if (page.items.length === 0) {
          lines.push(node.emptyText);
        }
        lines.push(...this.fitListings(session, node, page));
        if (page.hasMore) {
          lines.push(`${NEXT_PAGE_INPUT}. ${messages.moreLabel}`);
        }
        break;
      }

      case NODE_TYPES.TERMINAL:
        return { text: lines[0], continueSession: false };
    }

    if (node.back) {
      lines.push(`${BACK_INPUT}. ${messages.backLabel}`);
    }

    return { text: lines.join("\n"), continueSession: true };
  }

  /**
   * Item lines of a listing page, clipped so the header, an error notice and the
   * More/Back lines always fit the gateway payload. Items that cannot get a
   * readable description are left off the end of the page.
   */
  private fitListings(session: UssdSession, node: ListingPageNode, page: ListingPage): string[] {
    const messages = this.menuTree.messages;
    const fixed = [messages.invalidChoice, renderTemplate(node.prompt, session.collectedFields)];
    if (page.hasMore) {
      fixed.push(`${NEXT_PAGE_INPUT}. ${messages.moreLabel}`);
    }
    if (node.back) {
      fixed.push(`${BACK_INPUT}. ${messages.backLabel}`);
    }
    const room = this.config.maxResponseLength - CONTINUE_MARKER.length - fixed.join("\n").length;

    const blocks = page.items.map((item, index) => ({
      prefix: `${index + 1}. `,
      description: item.description,
      suffix: item.contact ? `\n   ${describeContact(item.contact)}` : "",
    }));

    for (let visible = blocks.length; visible > 0; visible--) {
      const shown = blocks.slice(0, visible);
      // Each block also costs the newline that joins it to the previous line
      const overhead = shown.reduce((sum, block) => sum + block.prefix.length + block.suffix.length + 1, 0);
      const share = Math.floor((room - overhead) / visible);

      if (share >= MIN_DESCRIPTION_LENGTH) {
        if (visible < blocks.length) {
          this.logger.warn(
            `Listing page at ${node.id} shows ${visible} of ${blocks.length} items to fit ${this.config.maxResponseLength} chars`,
          );
        }
        return shown.map((block) => block.prefix + clip(block.description, share) + block.suffix);
      }
    }

    return [];
  }

  private browse(session: UssdSession, node: ListingPageNode): Promise<ListingPage> {
    const fields = session.collectedFields;
    return this.listingsService.browse(
      fields.village ?? "",
      composeCategory(fields.category ?? "", fields.subcategory),
      session.page,
      node.pageSize ?? this.config.listingPageSize,
    );
  }
}

const clip = (text: string, max: number): string =>
  text.length <= max ? text : text.slice(0, max - ELLIPSIS.length).trimEnd() + ELLIPSIS;
