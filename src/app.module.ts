import { Module, ValidationPipe } from '@nestjs/common';
import { CacheModule } from '@nestjs/cache-manager';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_FILTER, APP_GUARD, APP_PIPE } from '@nestjs/core';

import { AppController } from './app.controller';
import { AppService } from './app.service';
import { GatewayConfigModule } from './config/gateway-config.module';
import { GATEWAY_CONFIG, GatewayConfig } from './config/environment.config';
import { CONSTANTS } from './constants';
import { AuthController } from './controllers/auth.controller';
import { LedgerInfoController } from './controllers/ledger-info.controller';
import { NodesController } from './controllers/nodes.controller';
import { VpnController } from './controllers/vpn.controller';
import { HttpExceptionFilter } from './filters/http-exception.filter';
import { ACCESS_CHECKER, AccessChecker } from './services/access-checkers/access-checker.interface';
import { DirectBalanceChecker } from './services/access-checkers/direct-balance.checker';
import { PolicyAccessChecker } from './services/access-checkers/policy.checker';
import { CacheService } from './services/cache.service';
import { delegationRegistriesProvider } from './services/delegation-registries';
import { DelegationService } from './services/delegation.service';
import { GatewayService } from './services/gateway.service';
import { publicClientProvider, walletClientProvider } from './services/ledger-client.provider';
import { LedgerTaskQueueService } from './services/ledger-task-queue.service';
import { NodeDirectoryService } from './services/node-directory.service';
import { NonceService } from './services/nonce.service';
import { PeerManagerService } from './services/peer-manager.service';
import { ReputationService } from './services/reputation.service';
import { RevocationWatcherService } from './services/revocation/revocation-watcher.service';
import { TRANSFER_EVENT_SOURCE } from './services/revocation/transfer-event-source.interface';
import { ViemTransferSource } from './services/revocation/viem-transfer.source';
import { SessionGateService } from './services/session-gate.service';
import { SessionLedgerService } from './services/session-ledger.service';
import { SiweService } from './services/siwe.service';
import { SubscriptionLedgerService } from './services/subscription-ledger.service';
import { TierResolverService } from './services/tier-resolver.service';
import { TUNNEL_ENDPOINT } from './services/tunnel/tunnel-endpoint.interface';
import { WireGuardEndpoint } from './services/tunnel/wireguard.endpoint';

/**
 * AppModule - Main application module
 *
 * Wires the gateway: configuration, ledger clients, access checks,
 * sessions, the tunnel peer table and transfer-driven revocation.
 *
 * Global concerns:
 * - **Caching**: in-memory tier, delegation, node and reputation caches
 * - **Scheduling**: sweeps of expired nonces, sessions and peers
 * - **Security**: per-client rate limiting, input validation, `{ error }` responses
 *
 * The ledger clients, tunnel endpoint and transfer source are bound to
 * tokens so tests can replace them with in-process doubles.
 */
@Module({
  imports: [
    GatewayConfigModule,

    CacheModule.register({
      ttl: CONSTANTS.DEFAULTS.CACHE_TTL_MS,
      max: CONSTANTS.CACHE_MAX_ENTRIES,
    }),

    ScheduleModule.forRoot(),

    ThrottlerModule.forRootAsync({
      inject: [GATEWAY_CONFIG],
      useFactory: (config: GatewayConfig) => [
        {
          ttl: CONSTANTS.RATE_LIMIT_WINDOW_MS,
          limit: config.rateLimitPerMinute,
        },
      ],
    }),
  ],
  controllers: [AppController, AuthController, VpnController, LedgerInfoController, NodesController],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true, transform: true }),
    },
    { provide: APP_FILTER, useClass: HttpExceptionFilter },

    AppService,

    // Ledger access
    publicClientProvider,
    walletClientProvider,
    PolicyAccessChecker,
    DirectBalanceChecker,
    {
      provide: ACCESS_CHECKER,
      inject: [GATEWAY_CONFIG, PolicyAccessChecker, DirectBalanceChecker],
      useFactory: (config: GatewayConfig, policy: PolicyAccessChecker, direct: DirectBalanceChecker): AccessChecker =>
        config.access.mode === 'policy' ? policy : direct,
    },
    delegationRegistriesProvider,
    LedgerTaskQueueService,
    SessionLedgerService,
    SubscriptionLedgerService,

    // Identity and access
    CacheService,
    NonceService,
    SiweService,
    DelegationService,
    TierResolverService,
    ReputationService,
    NodeDirectoryService,

    // Sessions and tunnel
    WireGuardEndpoint,
    { provide: TUNNEL_ENDPOINT, useExisting: WireGuardEndpoint },
    PeerManagerService,
    SessionGateService,
    ViemTransferSource,
    { provide: TRANSFER_EVENT_SOURCE, useExisting: ViemTransferSource },
    RevocationWatcherService,

    GatewayService,
  ],
})
export class AppModule {}
