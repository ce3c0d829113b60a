import { Test, TestingModule } from '@nestjs/testing';
import { GATEWAY_CONFIG } from '../src/config/environment.config';
import { PeerManagerService } from '../src/services/peer-manager.service';
import { TUNNEL_ENDPOINT } from '../src/services/tunnel/tunnel-endpoint.interface';
import { ErrorType } from '../src/utils/error-handling.util';
import { SERVER_KEY, testConfig, wgKey } from './helpers/test-config';
import { RecordingTunnelEndpoint } from './helpers/tunnel-doubles';
import { alice, bob } from './helpers/wallets';

describe('PeerManagerService', () => {
  let service: PeerManagerService;
  let endpoint: RecordingTunnelEndpoint;

  async function build(subnet = '10.8.0.0/24'): Promise<void> {
    endpoint = new RecordingTunnelEndpoint();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PeerManagerService,
        { provide: GATEWAY_CONFIG, useValue: testConfig({ WG_SUBNET: subnet }) },
        { provide: TUNNEL_ENDPOINT, useValue: endpoint },
      ],
    }).compile();
    service = module.get<PeerManagerService>(PeerManagerService);
  }

  beforeEach(async () => {
    await build();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('addPeer', () => {
    it('should configure the peer with a /32 and return client settings', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      jest.setSystemTime(new Date('2026-05-01T00:00:00.000Z'));

      const config = await service.addPeer(wgKey(1), 60_000, alice.address);

      expect(config).toEqual({
        serverPublicKey: SERVER_KEY,
        serverEndpoint: 'vpn.gateway.test:51820',
        clientAddress: '10.8.0.2/24',
        dns: '1.1.1.1',
        allowedIps: '0.0.0.0/0, ::/0',
        expiresAt: new Date('2026-05-01T00:01:00.000Z'),
      });
      expect(endpoint.commands).toEqual([`set ${wgKey(1)} 10.8.0.2/32`]);
      expect(service.getPeer(wgKey(1))?.owner).toBe(alice.address);
    });

    it('should keep the address and refresh the expiry when the key reconnects', async () => {
      const first = await service.addPeer(wgKey(1), 1_000, alice.address);
      const second = await service.addPeer(wgKey(1), 60_000, alice.address);

      expect(second.clientAddress).toBe(first.clientAddress);
      expect(second.expiresAt.getTime()).toBeGreaterThan(first.expiresAt.getTime());
      expect(service.peerCount).toBe(1);
      expect(service.allocatedAddresses()).toEqual(['10.8.0.2']);
    });

    it('should refuse a key live for another wallet', async () => {
      await service.addPeer(wgKey(1), 60_000, alice.address);

      await expect(service.addPeer(wgKey(1), 60_000, bob.address)).rejects.toMatchObject({
        type: ErrorType.CONFLICT,
      });
      expect(service.getPeer(wgKey(1))?.owner).toBe(alice.address);
    });

    it('should give each key its own address', async () => {
      const configs = await Promise.all([1, 2, 3].map((n) => service.addPeer(wgKey(n), 60_000)));
      expect(new Set(configs.map((c) => c.clientAddress)).size).toBe(3);
      expect(service.allocatedAddresses().sort()).toEqual([...service.peerAddresses()].sort());
    });

    it('should release the address when the endpoint rejects a new peer', async () => {
      endpoint.failConfigure = true;

      await expect(service.addPeer(wgKey(1), 60_000)).rejects.toMatchObject({ type: ErrorType.UPSTREAM_ERROR });
      expect(service.peerCount).toBe(0);
      expect(service.allocatedAddresses()).toEqual([]);
    });

    it('should keep an existing peer when reconfiguring it fails', async () => {
      await service.addPeer(wgKey(1), 60_000);
      endpoint.failConfigure = true;

      await expect(service.addPeer(wgKey(1), 60_000)).rejects.toMatchObject({ type: ErrorType.UPSTREAM_ERROR });
      expect(service.peerCount).toBe(1);
      expect(service.allocatedAddresses()).toEqual(['10.8.0.2']);
    });

    it('should fail with pool exhausted once every address is held', async () => {
      await build('10.8.0.0/29');
      expect(service.poolCapacity).toBe(5);
      for (let n = 1; n <= 5; n++) {
        await service.addPeer(wgKey(n), 60_000);
      }

      await expect(service.addPeer(wgKey(6), 60_000)).rejects.toMatchObject({
        type: ErrorType.POOL_EXHAUSTED,
        message: 'IP pool exhausted',
      });
      expect(service.peerCount).toBe(5);
    });
  });

  describe('removePeer', () => {
    it('should deconfigure the peer and release its address', async () => {
      await service.addPeer(wgKey(1), 60_000, alice.address);

      await service.removePeer(wgKey(1), alice.address);

      expect(endpoint.commands).toEqual([`set ${wgKey(1)} 10.8.0.2/32`, `remove ${wgKey(1)}`]);
      expect(service.peerCount).toBe(0);
      expect(service.allocatedAddresses()).toEqual([]);
    });

    it('should report an unknown key as not found', async () => {
      await expect(service.removePeer(wgKey(9))).rejects.toMatchObject({
        type: ErrorType.NOT_FOUND,
        message: 'peer not found',
      });
    });

    it("should not remove another wallet's peer", async () => {
      await service.addPeer(wgKey(1), 60_000, alice.address);

      await expect(service.removePeer(wgKey(1), bob.address)).rejects.toMatchObject({ type: ErrorType.NOT_FOUND });
      expect(service.peerCount).toBe(1);
    });

    it('should mark the peer expired when the endpoint refuses, for the sweep to retry', async () => {
      await service.addPeer(wgKey(1), 60_000);
      endpoint.failRemove = true;

      await expect(service.removePeer(wgKey(1))).rejects.toMatchObject({ type: ErrorType.UPSTREAM_ERROR });
      expect(service.peerCount).toBe(1);

      endpoint.failRemove = false;
      await new Promise((resolve) => setTimeout(resolve, 2));
      await expect(service.sweepExpired()).resolves.toBe(1);
      expect(service.peerCount).toBe(0);
      expect(endpoint.peers.size).toBe(0);
    });
  });

  describe('sweepExpired', () => {
    it('should remove only expired peers', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      jest.setSystemTime(new Date('2026-05-01T00:00:00.000Z'));
      await service.addPeer(wgKey(1), 1_000);
      await service.addPeer(wgKey(2), 10_000);

      jest.setSystemTime(new Date('2026-05-01T00:00:05.000Z'));
      await expect(service.sweepExpired()).resolves.toBe(1);

      expect(service.getPeer(wgKey(1))).toBeUndefined();
      expect(service.getPeer(wgKey(2))).toBeDefined();
      expect(service.allocatedAddresses()).toEqual(['10.8.0.3']);
    });

    it('should release an expired peer even when the endpoint fails', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
      jest.setSystemTime(new Date('2026-05-01T00:00:00.000Z'));
      await service.addPeer(wgKey(1), 1_000);
      endpoint.failRemove = true;

      jest.setSystemTime(new Date('2026-05-01T00:00:02.000Z'));
      await expect(service.sweepExpired()).resolves.toBe(1);
      expect(service.peerCount).toBe(0);
      expect(service.allocatedAddresses()).toEqual([]);
    });
  });
});
