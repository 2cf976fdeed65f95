import { Body, Controller, Header, HttpCode, HttpStatus, Logger, Post, UseGuards } from "@nestjs/common";
import { UssdCallbackDto } from "../dto/ussd-callback.dto";
import { CallerThrottlerGuard } from "../guards/caller-throttler.guard";
import { UssdGatewayService } from "../services/ussd-gateway.service";

@Controller()
export class UssdController {
  private readonly logger = new Logger(UssdController.name);

  constructor(private readonly gatewayService: UssdGatewayService) {}

  @Post(["ussd", ""])
  @HttpCode(HttpStatus.OK)
  @Header("Content-Type", "text/plain")
  @UseGuards(CallerThrottlerGuard)
  async handleCallback(@Body() callback: UssdCallbackDto): Promise<string> {
    this.logger.debug(`Callback for session ${callback.sessionId}`, {
      serviceCode: callback.serviceCode,
      networkCode: callback.networkCode,
    });
    return this.gatewayService.handleCallback(callback);
  }
}
