import { Injectable } from "@nestjs/common";
import { ThrottlerGuard } from "@nestjs/throttler";

/** Rate-limits gateway callbacks per caller rather than per gateway IP */
@Injectable()
export class CallerThrottlerGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    const body = req.body;
    if (typeof body === "object" && body !== null && "phoneNumber" in body) {
      const { phoneNumber } = body;
      if (typeof phoneNumber === "string" && phoneNumber.length > 0) {
        return `caller:${phoneNumber}`;
      }
    }
    return typeof req.ip === "string" ? req.ip : "unknown";
  }
}
