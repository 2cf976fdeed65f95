import { DEFAULT_USSD_CONFIG, UssdConfig } from "../config/ussd.config";
import { MenuMessages, MenuTreeDefinition } from "../modules/menu/types/menu.types";

export const TEST_MESSAGES: MenuMessages = {
  invalidChoice: "Invalid choice.",
  tooManyAttempts: "Too many attempts.",
  goodbye: "Goodbye.",
  sessionExpired: "Session timed out.",
  serviceUnavailable: "Try again later.",
  unexpectedError: "Something went wrong.",
  backLabel: "Back",
  moreLabel: "More",
  listingUnavailable: "Listing unavailable.",
  missingDetails: "Details missing.",
};

export const testUssdConfig = (overrides: Partial<UssdConfig> = {}): UssdConfig => ({
  ...DEFAULT_USSD_CONFIG,
  ...overrides,
});

/** Category, village confirmation, description, contact, then publish */
export const publishingTreeDefinition = (): MenuTreeDefinition => ({
  root: "category",
  messages: { ...TEST_MESSAGES },
  nodes: [
    {
      id: "category",
      type: "menu",
      prompt: "Choose category",
      field: "category",
      choices: [
        { input: "1", label: "Seeds & Inputs", next: "village" },
        { input: "2", label: "Livestock", next: "village" },
      ],
    },
    {
      id: "village",
      type: "menu",
      prompt: "Confirm village",
      field: "village",
      choices: [
        { input: "1", label: "Sega", next: "description" },
        { input: "2", label: "Bumala", next: "description" },
      ],
      back: true,
    },
    {
      id: "description",
      type: "input",
      prompt: "Describe {category}",
      field: "description",
      validator: { type: "text", minLength: 3, maxLength: 60 },
      next: "contact",
      back: true,
    },
    {
      id: "contact",
      type: "input",
      prompt: "Contact number",
      field: "contact",
      validator: { type: "phone" },
      next: "publish",
      back: true,
    },
    {
      id: "publish",
      type: "terminal",
      prompt: "Published. Ref {routingToken}",
      effect: "publish_listing",
    },
  ],
});

/** Village and category selection into a paged result list */
export const browsingTreeDefinition = (): MenuTreeDefinition => ({
  root: "main",
  messages: { ...TEST_MESSAGES },
  options: {
    villages: ["Sega", "Bumala"],
    categories: ["Farm Produce", "Transport"],
    transport: ["Riders", "Pickups"],
  },
  nodes: [
    {
      id: "main",
      type: "menu",
      prompt: "Market",
      choices: [
        { input: "1", label: "Browse", next: "browse_village" },
        { input: "2", label: "Leave", next: "leave" },
      ],
    },
    {
      id: "leave",
      type: "terminal",
      prompt: "See you soon.",
      outcome: "abandoned",
    },
    {
      id: "browse_village",
      type: "menu",
      prompt: "Village",
      field: "village",
      options: "villages",
      next: "browse_category",
      back: true,
    },
    {
      id: "browse_category",
      type: "menu",
      prompt: "Category in {village}",
      field: "category",
      options: "categories",
      next: "browse_results",
      branches: { Transport: "browse_transport" },
      back: true,
    },
    {
      id: "browse_transport",
      type: "menu",
      prompt: "Transport",
      field: "subcategory",
      options: "transport",
      next: "browse_results",
      back: true,
    },
    {
      id: "browse_results",
      type: "listing_page",
      prompt: "{village} - {category}",
      field: "listingId",
      next: "contact_shown",
      pageSize: 2,
      emptyText: "No listings yet.",
      back: true,
    },
    {
      id: "contact_shown",
      type: "terminal",
      prompt: "{description}\n{contactLine}",
      effect: "reveal_contact",
    },
  ],
});
