import { Injectable } from '@nestjs/common';
import { HealthResponse } from './models/api.interface';
import { PeerManagerService } from './services/peer-manager.service';
import { SessionGateService } from './services/session-gate.service';

/**
 * AppService
 *
 * Liveness and a snapshot of gateway load, for load balancers and
 * monitoring.
 */
@Injectable()
export class AppService {
  constructor(
    private readonly sessions: SessionGateService,
    private readonly peers: PeerManagerService,
  ) {}

  getHealth(): HealthResponse {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      active_sessions: this.sessions.activeSessionCount(),
      active_peers: this.peers.peerCount,
    };
  }
}
