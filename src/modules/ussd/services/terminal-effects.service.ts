import { Inject, Injectable, Logger } from "@nestjs/common";
import { MENU_TREE, MenuTree } from "../../menu/menu-tree";
import { normalizePhone } from "../../menu/menu-validators";
import { TERMINAL_EFFECTS, TerminalEffect } from "../../menu/types/menu.types";
import { ListingsService } from "../../listings/listings.service";
import {
  ContactRoute,
  LISTING_VISIBILITY,
  composeCategory,
  isListingVisibility,
} from "../../listings/types/listing.types";
import { UssdSession } from "../../sessions/types/session.types";
import { EffectResult } from "../types/ussd.types";

export const describeContact = (route: ContactRoute): string =>
  route.kind === "number" ? `Call: ${route.number}` : `Ref: ${route.token}`;

/**
 * Side effects of terminal nodes. Listing failures propagate as DependencyError
 * so the caller is told to try again instead of seeing a false success.
 */
@Injectable()
export class TerminalEffectsService {
  private readonly logger = new Logger(TerminalEffectsService.name);

  constructor(
    private readonly listingsService: ListingsService,
    @Inject(MENU_TREE) private readonly menuTree: MenuTree,
  ) {}

  async run(effect: TerminalEffect, session: UssdSession): Promise<EffectResult> {
    switch (effect) {
      case TERMINAL_EFFECTS.NONE:
        return { ok: true, values: {} };
      case TERMINAL_EFFECTS.PUBLISH_LISTING:
        return this.publishListing(session);
      case TERMINAL_EFFECTS.REVEAL_CONTACT:
        return this.revealContact(session);
    }
  }

  private async publishListing(session: UssdSession): Promise<EffectResult> {
    const { village, category, subcategory, description, contact, visibility } =
      session.collectedFields;

    if (!village || !category || !description) {
      this.logger.warn(`Session ${session.sessionId} reached publish without required details`, {
        fields: Object.keys(session.collectedFields),
      });
      return { ok: false, message: this.menuTree.messages.missingDetails };
    }

    const published = await this.listingsService.publish({
      village,
      category: composeCategory(category, subcategory),
      description,
      contactNumber: contact ?? normalizePhone(session.callerId),
      visibility:
        visibility && isListingVisibility(visibility) ? visibility : LISTING_VISIBILITY.HIDDEN,
      ownerCallerId: session.callerId,
      sourceSessionId: session.sessionId,
    });

    return { ok: true, values: { ...published } };
  }

  private async revealContact(session: UssdSession): Promise<EffectResult> {
    const listingId = session.collectedFields.listingId;
    if (!listingId) {
      return { ok: false, message: this.menuTree.messages.missingDetails };
    }

    const listing = await this.listingsService.findListing(listingId);
    const route = listing ? await this.listingsService.getContactForRouting(listingId) : null;

    if (!listing || !route) {
      this.logger.log(`Listing ${listingId} disappeared before its contact was shown`);
      return { ok: false, message: this.menuTree.messages.listingUnavailable };
    }

    return {
      ok: true,
      values: {
        description: listing.description,
        village: listing.village,
        contactLine: describeContact(route),
      },
    };
  }
}
