import { Inject, Injectable, Logger } from "@nestjs/common";
import { USSD_CONFIG, UssdConfig } from "../../../config/ussd.config";

export const CONTINUE_MARKER = "CON ";
const END_MARKER = "END ";
const ELLIPSIS = "...";

@Injectable()
export class ResponseFormatterService {
  private readonly logger = new Logger(ResponseFormatterService.name);

  constructor(@Inject(USSD_CONFIG) private readonly config: UssdConfig) {}

  /** Wraps the text in the gateway envelope, cutting it to the payload limit */
  format(displayText: string, continueSession: boolean): string {
    const marker = continueSession ? CONTINUE_MARKER : END_MARKER;
    const body = displayText.trim();
    const limit = this.config.maxResponseLength;

    if (marker.length + body.length <= limit) {
      return marker + body;
    }

    this.logger.warn(`Response of ${marker.length + body.length} chars cut to ${limit}`);
    const room = Math.max(limit - marker.length - ELLIPSIS.length, 0);
    return marker + body.slice(0, room).trimEnd() + ELLIPSIS;
  }
}
