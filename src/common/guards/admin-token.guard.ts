import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { timingSafeEqual } from "crypto";
import type { Request } from "express";

const tokensMatch = (provided: string, expected: string): boolean => {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
};

/** Bearer-token check for operator endpoints; they stay closed while ADMIN_API_TOKEN is unset */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  private readonly logger = new Logger(AdminTokenGuard.name);

  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.configService.get<string>("ADMIN_API_TOKEN");

    if (!expected) {
      this.logger.warn("ADMIN_API_TOKEN not configured - admin endpoints disabled");
      throw new ForbiddenException("Admin API is disabled");
    }

    const request = context.switchToHttp().getRequest<Request>();
    const [scheme, token] = (request.headers.authorization ?? "").split(" ");

    if (scheme !== "Bearer" || !token || !tokensMatch(token, expected)) {
      this.logger.warn(`Rejected admin request to ${request.path}`);
      throw new UnauthorizedException("Invalid admin token");
    }

    return true;
  }
}
