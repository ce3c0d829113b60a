import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { RequestSignal } from '../decorators/request-signal.decorator';
import { ChallengeRequestDto, VerifyRequestDto } from '../dtos/auth.dto';
import { ChallengeResponse, VerifyResponse } from '../models/api.interface';
import { GatewayService } from '../services/gateway.service';

/**
 * Sign-In with Ethereum: request a challenge, then submit it signed.
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly gateway: GatewayService) {}

  @Post('challenge')
  @HttpCode(HttpStatus.OK)
  challenge(@Body() body: ChallengeRequestDto): ChallengeResponse {
    return this.gateway.issueChallenge(body.address);
  }

  /**
   * Verifies the signature, resolves the wallet's tier and opens a session.
   * The returned address is the session token for `/vpn/*`.
   */
  @Post('verify')
  @HttpCode(HttpStatus.OK)
  verify(@Body() body: VerifyRequestDto, @RequestSignal() signal: AbortSignal): Promise<VerifyResponse> {
    return this.gateway.verify(body.message, body.signature, signal);
  }
}
