/** Input that returns to the previous node on nodes declaring `back` */
export const BACK_INPUT = "0";

/** Input that advances a listing page when more results exist */
export const NEXT_PAGE_INPUT = "9";

export const MAX_LISTING_PAGE_SIZE = 8;

export const NODE_TYPES = {
  MENU: "menu",
  INPUT: "input",
  LISTING_PAGE: "listing_page",
  TERMINAL: "terminal",
} as const;

export const TERMINAL_EFFECTS = {
  NONE: "none",
  PUBLISH_LISTING: "publish_listing",
  REVEAL_CONTACT: "reveal_contact",
} as const;

export type TerminalEffect = (typeof TERMINAL_EFFECTS)[keyof typeof TERMINAL_EFFECTS];

export type TerminalOutcome = "completed" | "abandoned";

export type ValidatorSpec =
  | { type: "text"; minLength?: number; maxLength?: number }
  | { type: "phone" }
  | { type: "number"; min?: number; max?: number }
  | { type: "pattern"; pattern: string; message?: string };

/** Texts the dialog shows outside any single node */
export interface MenuMessages {
  invalidChoice: string;
  tooManyAttempts: string;
  goodbye: string;
  sessionExpired: string;
  serviceUnavailable: string;
  unexpectedError: string;
  backLabel: string;
  moreLabel: string;
  listingUnavailable: string;
  missingDetails: string;
}

export interface MenuChoice {
  input: string;
  label: string;
  next: string;
  value?: string;
}

interface BaseNode {
  id: string;
  prompt: string;
}

export interface MenuNode extends BaseNode {
  type: typeof NODE_TYPES.MENU;
  choices: MenuChoice[];
  field?: string;
  back: boolean;
}

export interface InputNode extends BaseNode {
  type: typeof NODE_TYPES.INPUT;
  field: string;
  validator: ValidatorSpec;
  next: string;
  back: boolean;
}

/** Choices are computed from listing query results every time the node is visited */
export interface ListingPageNode extends BaseNode {
  type: typeof NODE_TYPES.LISTING_PAGE;
  field: string;
  next: string;
  pageSize?: number;
  emptyText: string;
  back: boolean;
}

export interface TerminalNode extends BaseNode {
  type: typeof NODE_TYPES.TERMINAL;
  effect: TerminalEffect;
  outcome: TerminalOutcome;
}

export type MenuTreeNode = MenuNode | InputNode | ListingPageNode | TerminalNode;

export type InteractiveNode = Exclude<MenuTreeNode, TerminalNode>;

// Declarative source format (config/menu-tree.json)

export interface MenuNodeDefinition {
  id: string;
  type: typeof NODE_TYPES.MENU;
  prompt: string;
  field?: string;
  back?: boolean;
  choices?: MenuChoice[];
  /** Name of an option list expanded into choices 1..n */
  options?: string;
  next?: string;
  /** Per-option overrides of `next` */
  branches?: Record<string, string>;
}

export interface InputNodeDefinition {
  id: string;
  type: typeof NODE_TYPES.INPUT;
  prompt: string;
  field: string;
  validator: ValidatorSpec;
  next: string;
  back?: boolean;
}

export interface ListingPageNodeDefinition {
  id: string;
  type: typeof NODE_TYPES.LISTING_PAGE;
  prompt: string;
  field: string;
  next: string;
  pageSize?: number;
  emptyText: string;
  back?: boolean;
}

export interface TerminalNodeDefinition {
  id: string;
  type: typeof NODE_TYPES.TERMINAL;
  prompt: string;
  effect?: TerminalEffect;
  outcome?: TerminalOutcome;
}

export type MenuNodeDefinitionUnion =
  | MenuNodeDefinition
  | InputNodeDefinition
  | ListingPageNodeDefinition
  | TerminalNodeDefinition;

export interface MenuTreeDefinition {
  root: string;
  messages: MenuMessages;
  options?: Record<string, string[]>;
  nodes: MenuNodeDefinitionUnion[];
}
