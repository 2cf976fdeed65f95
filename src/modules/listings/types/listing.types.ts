import { ListingVisibility } from "../../../database/types";

export type { ListingVisibility };

export const LISTING_VISIBILITY = {
  HIDDEN: "HIDDEN",
  GATEWAY_ROUTED: "GATEWAY_ROUTED",
  PUBLIC: "PUBLIC",
} as const;

export const isListingVisibility = (value: string): value is ListingVisibility =>
  Object.values<string>(LISTING_VISIBILITY).includes(value);

export interface NewListing {
  village: string;
  category: string;
  description: string;
  contactNumber: string;
  visibility: ListingVisibility;
  ownerCallerId: string;
  /** Session that published the listing; a second publish from it is a no-op */
  sourceSessionId: string;
}

/** How a buyer reaches the seller: the number itself, or an opaque token the gateway bridges */
export type ContactRoute =
  | { kind: "number"; number: string }
  | { kind: "token"; token: string };

/** Browse row; carries no contact number unless the listing is PUBLIC */
export interface ListingSummary {
  id: string;
  village: string;
  category: string;
  description: string;
  visibility: ListingVisibility;
  contact: ContactRoute | null;
}

export interface ListingPage {
  items: ListingSummary[];
  page: number;
  hasMore: boolean;
}

export interface RoutedListing {
  listingId: string;
  village: string;
  category: string;
  description: string;
  contactNumber: string;
}

/** Transport sub-types are stored as "Transport - Riders" so browse and publish agree */
export const composeCategory = (category: string, subcategory?: string): string =>
  subcategory ? `${category} - ${subcategory}` : category;

export interface PublishedListing {
  listingId: string;
  routingToken: string;
}
