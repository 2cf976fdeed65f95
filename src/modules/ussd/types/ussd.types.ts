import { UssdSession } from "../../sessions/types/session.types";

export interface AdvanceOptions {
  now?: Date;
  /** One-line notice shown above the screen, e.g. after a timed-out session restarts */
  notice?: string;
}

export interface AdvanceResult {
  session: UssdSession;
  displayText: string;
  continueSession: boolean;
}

export interface UssdCallback {
  sessionId: string;
  phoneNumber: string;
  text?: string;
  serviceCode?: string;
  networkCode?: string;
}

export type EffectResult =
  | { ok: true; values: Record<string, string> }
  | { ok: false; message: string };
