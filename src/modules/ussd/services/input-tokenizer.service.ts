import { Inject, Injectable } from "@nestjs/common";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";

/**
 * The gateway resends everything the caller typed this dialog, joined by the
 * delimiter ("1*2*Maize"). Only the newest step is fed to the state machine.
 */
@Injectable()
export class InputTokenizerService {
  private readonly ignored: ReadonlySet<string>;

  constructor(@Inject(USSD_CONFIG) private readonly config: UssdConfig) {
    this.ignored = new Set(config.ignoredTokens);
  }

  tokenize(text: string | null | undefined): string[] {
    if (!text) {
      return [];
    }

    return text
      .split(this.config.inputDelimiter)
      .map((step) => step.trim())
      .filter((step) => step.length > 0 && !this.ignored.has(step));
  }

  /** Newest step, or null for the initial dial */
  latest(text: string | null | undefined): string | null {
    const steps = this.tokenize(text);
    return steps.length > 0 ? steps[steps.length - 1] : null;
  }

  /** Canonical form of the accumulated text, used to recognise redelivered callbacks */
  key(text: string | null | undefined): string {
    return this.tokenize(text).join(this.config.inputDelimiter);
  }
}
