import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from '../src/app.controller';
import { AppService } from '../src/app.service';
import { GATEWAY_CONFIG } from '../src/config/environment.config';
import { AccessTier } from '../src/models/access-tier';
import { PeerManagerService } from '../src/services/peer-manager.service';
import { SessionGateService } from '../src/services/session-gate.service';
import { TUNNEL_ENDPOINT } from '../src/services/tunnel/tunnel-endpoint.interface';
import { testConfig, wgKey } from './helpers/test-config';
import { RecordingTunnelEndpoint } from './helpers/tunnel-doubles';
import { alice, bob } from './helpers/wallets';

describe('AppController', () => {
  let controller: AppController;
  let sessions: SessionGateService;
  let peers: PeerManagerService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        SessionGateService,
        PeerManagerService,
        { provide: GATEWAY_CONFIG, useValue: testConfig() },
        { provide: TUNNEL_ENDPOINT, useValue: new RecordingTunnelEndpoint() },
      ],
    }).compile();

    controller = module.get<AppController>(AppController);
    sessions = module.get<SessionGateService>(SessionGateService);
    peers = module.get<PeerManagerService>(PeerManagerService);
  });

  describe('getHealth', () => {
    it('should report an idle gateway', () => {
      const health = controller.getHealth();

      expect(health.status).toBe('ok');
      expect(health.active_sessions).toBe(0);
      expect(health.active_peers).toBe(0);
      expect(Number.isNaN(Date.parse(health.time))).toBe(false);
    });

    it('should count live sessions and attached peers', async () => {
      sessions.createSession(alice.address, AccessTier.Free);
      sessions.createSession(bob.address, AccessTier.Paid);
      await peers.addPeer(wgKey(1), 60_000, alice.address);
      await sessions.attachPeer(alice.address, wgKey(1));

      const health = controller.getHealth();

      expect(health.active_sessions).toBe(2);
      expect(health.active_peers).toBe(1);
    });
  });
});
