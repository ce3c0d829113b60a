import { Controller, Get, Query } from '@nestjs/common';
import { RequestSignal } from '../decorators/request-signal.decorator';
import { RegionQueryDto } from '../dtos/nodes.dto';
import { NodesResponse } from '../models/api.interface';
import { GatewayService } from '../services/gateway.service';

/**
 * Node directory read from the registry contract, filtered by operator
 * reputation when the reputation API is configured.
 */
@Controller('nodes')
export class NodesController {
  constructor(private readonly gateway: GatewayService) {}

  @Get()
  list(@RequestSignal() signal: AbortSignal): Promise<NodesResponse> {
    return this.gateway.listNodes(signal);
  }

  @Get('region')
  byRegion(@Query() query: RegionQueryDto, @RequestSignal() signal: AbortSignal): Promise<NodesResponse> {
    return this.gateway.listNodesByRegion(query.region, signal);
  }
}
