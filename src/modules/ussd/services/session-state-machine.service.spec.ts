import { Test, TestingModule } from "@nestjs/testing";
import { DependencyError } from "../../../common/errors/ussd.errors";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";
import { InMemoryListingsRepository } from "../../../testing/in-memory-listings.repository";
import {
  browsingTreeDefinition,
  publishingTreeDefinition,
  testUssdConfig,
} from "../../../testing/menu-fixtures";
import { ListingsRepository } from "../../listings/listings.repository";
import { ListingsService } from "../../listings/listings.service";
import { MENU_TREE, buildMenuTree } from "../../menu/menu-tree";
import { MenuTreeDefinition } from "../../menu/types/menu.types";
import { UssdSession, createFreshSession } from "../../sessions/types/session.types";
import { AdvanceResult } from "../types/ussd.types";
import { SessionStateMachineService } from "./session-state-machine.service";
import { TerminalEffectsService } from "./terminal-effects.service";

describe("SessionStateMachineService", () => {
  let machine: SessionStateMachineService;
  let repository: InMemoryListingsRepository;

  const callerId = "254712345678";
  const now = new Date("2026-03-01T08:00:00.000Z");

  const createMachine = async (
    definition: MenuTreeDefinition,
    config: UssdConfig = testUssdConfig(),
  ) => {
    repository = new InMemoryListingsRepository();
    const tree = buildMenuTree(definition);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SessionStateMachineService,
        TerminalEffectsService,
        ListingsService,
        { provide: ListingsRepository, useValue: repository },
        { provide: MENU_TREE, useValue: tree },
        { provide: USSD_CONFIG, useValue: config },
      ],
    }).compile();

    machine = module.get<SessionStateMachineService>(SessionStateMachineService);
    return createFreshSession("s1", callerId, tree.root, now);
  };

  const walk = async (session: UssdSession, inputs: string[]): Promise<AdvanceResult> => {
    let result = await machine.advance(session, null, { now });
    for (const input of inputs) {
      result = await machine.advance(result.session, input, { now });
    }
    return result;
  };

  describe("publishing dialog", () => {
    let fresh: UssdSession;

    beforeEach(async () => {
      fresh = await createMachine(publishingTreeDefinition());
    });

    it("should render the current node when there is no input", async () => {
      const result = await machine.advance(fresh, null, { now });

      expect(result.displayText).toBe("Choose category\n1. Seeds & Inputs\n2. Livestock");
      expect(result.continueSession).toBe(true);
      expect(result.session.lastDisplay).toBe(result.displayText);
      expect(result.session.lastContinue).toBe(true);
    });

    it("should capture the chosen label and move to the next node", async () => {
      const result = await machine.advance(fresh, "1", { now });

      expect(result.session.currentNode).toBe("village");
      expect(result.session.collectedFields).toEqual({ category: "Seeds & Inputs" });
      expect(result.session.history).toEqual([{ nodeId: "category", field: "category" }]);
      expect(result.displayText).toBe("Confirm village\n1. Sega\n2. Bumala\n0. Back");
    });

    it("should never mutate the session it was given", async () => {
      const before = JSON.stringify(fresh);

      await machine.advance(fresh, "1", { now });

      expect(JSON.stringify(fresh)).toBe(before);
    });

    it("should stay on the node with an error notice for an invalid choice", async () => {
      const result = await machine.advance(fresh, "9", { now });

      expect(result.session.currentNode).toBe("category");
      expect(result.session.retryCount).toBe(1);
      expect(result.continueSession).toBe(true);
      expect(result.displayText).toBe("Invalid choice.\nChoose category\n1. Seeds & Inputs\n2. Livestock");
    });

    it("should abandon the session after too many invalid inputs", async () => {
      let result = await machine.advance(fresh, "9", { now });
      for (let attempt = 2; attempt <= 3; attempt++) {
        result = await machine.advance(result.session, "9", { now });
        expect(result.continueSession).toBe(true);
      }

      result = await machine.advance(result.session, "9", { now });

      expect(result.session.status).toBe("ABANDONED");
      expect(result.continueSession).toBe(false);
      expect(result.displayText).toBe("Too many attempts.");
    });

    it("should reset the retry counter after a valid input", async () => {
      const result = await walk(fresh, ["9", "9", "1"]);

      expect(result.session.retryCount).toBe(0);
      expect(result.session.currentNode).toBe("village");
    });

    it("should show validator messages above the prompt", async () => {
      const result = await walk(fresh, ["1", "2", "ab"]);

      expect(result.session.currentNode).toBe("description");
      expect(result.displayText).toBe("Enter at least 3 characters.\nDescribe Seeds & Inputs\n0. Back");
    });

    it("should go back and drop the field captured by the node returned to", async () => {
      const atDescription = await walk(fresh, ["1", "2"]);
      expect(atDescription.session.collectedFields).toEqual({
        category: "Seeds & Inputs",
        village: "Bumala",
      });

      const back = await machine.advance(atDescription.session, "0", { now });

      expect(back.session.currentNode).toBe("village");
      expect(back.session.collectedFields).toEqual({ category: "Seeds & Inputs" });
      expect(back.session.history).toEqual([{ nodeId: "category", field: "category" }]);
      expect(back.displayText).toBe("Confirm village\n1. Sega\n2. Bumala\n0. Back");
    });

    it("should keep fields in visitation order after revisiting a node", async () => {
      const result = await walk(fresh, ["1", "0", "2", "1"]);

      expect(Object.entries(result.session.collectedFields)).toEqual([
        ["category", "Livestock"],
        ["village", "Sega"],
      ]);
    });

    it("should treat 0 as an ordinary input on nodes without back", async () => {
      const result = await machine.advance(fresh, "0", { now });

      expect(result.session.currentNode).toBe("category");
      expect(result.displayText).toMatch(/^Invalid choice\.\n/);
    });

    it("should abandon the session on an exit input", async () => {
      const result = await walk(fresh, ["1", "00"]);

      expect(result.session.status).toBe("ABANDONED");
      expect(result.displayText).toBe("Goodbye.");
      expect(result.continueSession).toBe(false);
    });

    it("should publish a hidden listing when the terminal node is reached", async () => {
      const result = await walk(fresh, ["1", "2", "Maize seeds for sale", "0712345678"]);

      expect(result.session.status).toBe("COMPLETED");
      expect(result.continueSession).toBe(false);
      expect(repository.rows).toHaveLength(1);
      expect(repository.rows[0]).toMatchObject({
        village: "Bumala",
        category: "Seeds & Inputs",
        description: "Maize seeds for sale",
        contactNumber: "0712345678",
        visibility: "HIDDEN",
        ownerCallerId: callerId,
        sourceSessionId: "s1",
      });
      expect(result.displayText).toBe(`Published. Ref ${repository.rows[0].routingToken}`);
    });

    it("should replay the final screen of a completed session without publishing again", async () => {
      const completed = await walk(fresh, ["1", "2", "Maize seeds for sale", "0712345678"]);

      const replay = await machine.advance(completed.session, "0712345678", { now });

      expect(replay.displayText).toBe(completed.displayText);
      expect(replay.continueSession).toBe(false);
      expect(replay.session.status).toBe("COMPLETED");
      expect(repository.rows).toHaveLength(1);
    });

    it("should start over when given an abandoned session", async () => {
      const abandoned = await walk(fresh, ["1", "00"]);

      const result = await machine.advance(abandoned.session, "2", { now });

      expect(result.session.status).toBe("ACTIVE");
      expect(result.session.currentNode).toBe("category");
      expect(result.session.collectedFields).toEqual({});
      expect(result.displayText).toBe("Choose category\n1. Seeds & Inputs\n2. Livestock");
    });

    it("should prefix the notice when one is given", async () => {
      const result = await machine.advance(fresh, null, { now, notice: "Session timed out." });

      expect(result.displayText).toBe(
        "Session timed out.\nChoose category\n1. Seeds & Inputs\n2. Livestock",
      );
    });

    it("should stamp the time of the turn", async () => {
      const later = new Date("2026-03-01T08:01:00.000Z");

      const result = await machine.advance(fresh, "1", { now: later });

      expect(result.session.lastSeenAt).toEqual(later);
      expect(result.session.createdAt).toEqual(now);
    });

    it("should let listing failures propagate so the caller can retry", async () => {
      const atContact = await walk(fresh, ["1", "2", "Maize seeds for sale"]);
      jest.spyOn(repository, "insert").mockRejectedValue(new Error("connection reset"));

      await expect(machine.advance(atContact.session, "0712345678", { now })).rejects.toThrow(
        DependencyError,
      );
      expect(atContact.session.status).toBe("ACTIVE");
    });
  });

  describe("browsing dialog", () => {
    let fresh: UssdSession;

    const seed = (description: string, visibility: "HIDDEN" | "GATEWAY_ROUTED" | "PUBLIC", token: string) =>
      repository.insert({
        village: "Sega",
        category: "Transport - Riders",
        description,
        contactNumber: "0700000002",
        visibility,
        ownerCallerId: "254700000002",
        routingToken: token,
      });

    beforeEach(async () => {
      fresh = await createMachine(browsingTreeDefinition());
      await seed("Boda at the stage", "HIDDEN", "RT-0001");
      await seed("Night rider", "PUBLIC", "RT-0002");
      await seed("Pikipiki delivery", "GATEWAY_ROUTED", "RT-0003");
    });

    it("should expand option lists and follow branches", async () => {
      const village = await walk(fresh, ["1"]);
      expect(village.displayText).toBe("Village\n1. Sega\n2. Bumala\n0. Back");

      const category = await machine.advance(village.session, "1", { now });
      expect(category.displayText).toBe("Category in Sega\n1. Farm Produce\n2. Transport\n0. Back");

      const transport = await machine.advance(category.session, "2", { now });
      expect(transport.session.currentNode).toBe("browse_transport");
      expect(transport.displayText).toBe("Transport\n1. Riders\n2. Pickups\n0. Back");
    });

    it("should list the newest listings with contact lines gated by visibility", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1"]);

      expect(result.session.currentNode).toBe("browse_results");
      expect(result.displayText).toBe(
        [
          "Sega - Transport",
          "1. Pikipiki delivery",
          "   Ref: RT-0003",
          "2. Night rider",
          "   Call: 0700000002",
          "9. More",
          "0. Back",
        ].join("\n"),
      );
    });

    it("should page forward with 9 and never show a hidden number", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1", "9"]);

      expect(result.session.page).toBe(1);
      expect(result.displayText).toBe("Sega - Transport\n1. Boda at the stage\n0. Back");
    });

    it("should reject 9 when there are no more pages", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1", "9", "9"]);

      expect(result.session.page).toBe(1);
      expect(result.session.retryCount).toBe(1);
      expect(result.displayText).toBe(
        "Invalid choice.\nSega - Transport\n1. Boda at the stage\n0. Back",
      );
    });

    it("should reject selections beyond the current page", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1", "3"]);

      expect(result.session.currentNode).toBe("browse_results");
      expect(result.displayText).toMatch(/^Invalid choice\.\n/);
    });

    it("should reveal only the routing token of a hidden listing", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1", "9", "1"]);

      expect(result.session.status).toBe("COMPLETED");
      expect(result.session.collectedFields.listingId).toBe(repository.rows[0].id);
      expect(result.displayText).toBe("Boda at the stage\nRef: RT-0001");
    });

    it("should reveal the number of a public listing", async () => {
      const result = await walk(fresh, ["1", "1", "2", "1", "2"]);

      expect(result.displayText).toBe("Night rider\nCall: 0700000002");
    });

    it("should show the empty text when nothing matches", async () => {
      const result = await walk(fresh, ["1", "2", "1"]);

      expect(result.displayText).toBe("Bumala - Farm Produce\nNo listings yet.\n0. Back");
    });

    it("should end the dialog when the listing disappears before its contact is shown", async () => {
      jest.spyOn(repository, "findById").mockResolvedValue(null);

      const result = await walk(fresh, ["1", "1", "2", "1", "1"]);

      expect(result.session.status).toBe("ABANDONED");
      expect(result.displayText).toBe("Listing unavailable.");
    });

    it("should never show a hidden seller's number written into the description", async () => {
      await repository.insert({
        village: "Sega",
        category: "Farm Produce",
        description: "Maize call 0712345678",
        contactNumber: "0712345678",
        visibility: "HIDDEN",
        ownerCallerId: "254712345678",
        routingToken: "RT-0005",
      });

      const result = await walk(fresh, ["1", "1", "1"]);

      expect(result.displayText).toBe("Sega - Farm Produce\n1. Maize call [hidden]\n0. Back");
    });

    it("should clip long descriptions so paging and back stay on screen", async () => {
      fresh = await createMachine(browsingTreeDefinition(), testUssdConfig({ maxResponseLength: 130 }));
      await seed("Boda rider at the Sega stage all day long", "GATEWAY_ROUTED", "RT-0001");
      await seed("Night rider from Sega stage to the clinic", "GATEWAY_ROUTED", "RT-0002");
      await seed("Pikipiki delivery to Bumala market daily", "GATEWAY_ROUTED", "RT-0003");

      const result = await walk(fresh, ["1", "1", "2", "1"]);

      expect(result.displayText).toBe(
        [
          "Sega - Transport",
          "1. Pikipiki deliver...",
          "   Ref: RT-0003",
          "2. Night rider from...",
          "   Ref: RT-0002",
          "9. More",
          "0. Back",
        ].join("\n"),
      );

      const rejected = await machine.advance(result.session, "5", { now });
      expect(`CON ${rejected.displayText}`.length).toBeLessThanOrEqual(130);
      expect(rejected.displayText.endsWith("9. More\n0. Back")).toBe(true);
    });

    it("should only accept selections among the items that fit", async () => {
      fresh = await createMachine(browsingTreeDefinition(), testUssdConfig({ maxResponseLength: 90 }));
      await seed("Boda rider at the Sega stage all day long", "GATEWAY_ROUTED", "RT-0001");
      await seed("Night rider from Sega stage to the clinic", "GATEWAY_ROUTED", "RT-0002");

      const page = await walk(fresh, ["1", "1", "2", "1"]);
      expect(page.displayText).toBe(
        "Sega - Transport\n1. Night rider from Sega s...\n   Ref: RT-0002\n0. Back",
      );

      const result = await machine.advance(page.session, "2", { now });

      expect(result.session.currentNode).toBe("browse_results");
      expect(result.displayText).toMatch(/^Invalid choice\.\n/);
    });

    it("should finish as abandoned on a terminal node with that outcome", async () => {
      const result = await walk(fresh, ["2"]);

      expect(result.session.status).toBe("ABANDONED");
      expect(result.continueSession).toBe(false);
      expect(result.displayText).toBe("See you soon.");
    });
  });
});
