import { Controller, Get } from '@nestjs/common';
import { RequestSignal } from '../decorators/request-signal.decorator';
import { SessionInfoResponse, SubscriptionTiersResponse } from '../models/api.interface';
import { GatewayService } from '../services/gateway.service';

/**
 * Pricing published by the session and subscription contracts, so clients
 * can pay before connecting on the paid tier. 503 when a contract is not
 * configured.
 */
@Controller()
export class LedgerInfoController {
  constructor(private readonly gateway: GatewayService) {}

  @Get('session/info')
  sessionInfo(@RequestSignal() signal: AbortSignal): Promise<SessionInfoResponse> {
    return this.gateway.sessionInfo(signal);
  }

  @Get('subscription/tiers')
  subscriptionTiers(@RequestSignal() signal: AbortSignal): Promise<SubscriptionTiersResponse> {
    return this.gateway.subscriptionTiers(signal);
  }
}
