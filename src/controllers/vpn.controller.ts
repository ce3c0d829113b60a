import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { RequestSignal } from '../decorators/request-signal.decorator';
import { PeerRequestDto, SessionTokenQueryDto } from '../dtos/vpn.dto';
import { ConnectResponse, DisconnectResponse, StatusResponse } from '../models/api.interface';
import { GatewayService } from '../services/gateway.service';

@Controller('vpn')
export class VpnController {
  constructor(private readonly gateway: GatewayService) {}

  /**
   * Provisions a tunnel peer for the session and returns the client-side
   * WireGuard settings. Reconnecting with the same key refreshes the peer.
   */
  @Post('connect')
  @HttpCode(HttpStatus.OK)
  connect(@Body() body: PeerRequestDto, @RequestSignal() signal: AbortSignal): Promise<ConnectResponse> {
    return this.gateway.connect(body.session_token, body.public_key, signal);
  }

  @Post('disconnect')
  @HttpCode(HttpStatus.OK)
  disconnect(@Body() body: PeerRequestDto): Promise<DisconnectResponse> {
    return this.gateway.disconnect(body.session_token, body.public_key);
  }

  @Get('status')
  status(@Query() query: SessionTokenQueryDto): StatusResponse {
    return this.gateway.status(query.session_token);
  }
}
