import dotenv from 'dotenv';
import { Address, getAddress, Hex, isAddress, isHex } from 'viem';
import { CONSTANTS } from '../constants';
import { ErrorFactory } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';

// Load environment variables once at startup
dotenv.config();

/** Injection token for the validated {@link GatewayConfig}. */
export const GATEWAY_CONFIG = 'GATEWAY_CONFIG';

export type AccessCheckMode = 'policy' | 'direct';

export interface GatewayConfig {
  port: number;
  nodeEnv: string;
  corsOrigin: string | null;
  rateLimitPerMinute: number;

  ledger: {
    rpcUrl: string;
    /** Enables the revocation watcher when set. */
    wsUrl: string | null;
    chainId: number;
    callTimeoutMs: number;
  };

  access: {
    mode: AccessCheckMode;
    assetContract: Address;
    policyContract: Address | null;
    /** Token id granting the free tier in direct mode; 0 disables it. */
    freeTokenId: bigint;
    maxTokenId: bigint;
  };

  delegation: {
    enabled: boolean;
    delegateRegistry: Address | null;
    collectionRegistry: Address | null;
    cacheTtlMs: number;
  };

  siwe: {
    domain: string;
    uri: string;
    statement: string;
    challengeTtlMs: number;
    nonceLength: number;
  };

  sessions: {
    credentialTtlMs: number;
    tierCacheTtlMs: number;
  };

  tunnel: {
    interfaceName: string;
    serverPublicKey: string;
    serverEndpoint: string;
    subnet: string;
    dns: string;
    allowedIps: string;
    commandTimeoutMs: number;
  };

  revocation: {
    backoffMs: number;
  };

  sessionManager: {
    contract: Address | null;
    operatorPrivateKey: Hex | null;
    /** Operator address recorded as the serving node; defaults to the operator key's account. */
    nodeOperator: Address | null;
    freeSessionDurationSeconds: number;
  };

  subscriptionManager: {
    contract: Address | null;
  };

  ledgerWrites: {
    maxAttempts: number;
    retryDelayMs: number;
    maxPending: number;
  };

  nodes: {
    registryContract: Address | null;
    cacheTtlMs: number;
  };

  reputation: {
    apiUrl: string | null;
    category: string;
    minRep: number;
    cacheTtlMs: number;
    timeoutMs: number;
    userBanCheck: boolean;
    userBanCategory: string;
  };
}

type Env = Record<string, string | undefined>;

/**
 * Centralized environment configuration
 *
 * `load` turns the process environment into a typed {@link GatewayConfig};
 * `validate` rejects configurations the gateway cannot start with. Both throw
 * configuration errors, which abort bootstrap.
 *
 * Sweep intervals are static because scheduling decorators read them when
 * the service classes are defined.
 */
export class EnvironmentConfig {
  public static readonly NODE_ENV = process.env.NODE_ENV;
  public static readonly IS_TEST = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;

  public static readonly NONCE_SWEEP_INTERVAL_MS =
    Number(process.env.NONCE_SWEEP_INTERVAL_MS) || CONSTANTS.DEFAULTS.SWEEP_INTERVAL_MS;
  public static readonly SESSION_SWEEP_INTERVAL_MS =
    Number(process.env.SESSION_SWEEP_INTERVAL_MS) || CONSTANTS.DEFAULTS.SWEEP_INTERVAL_MS;
  public static readonly PEER_SWEEP_INTERVAL_MS =
    Number(process.env.PEER_SWEEP_INTERVAL_MS) || CONSTANTS.DEFAULTS.SWEEP_INTERVAL_MS;

  public static load(env: Env = process.env): GatewayConfig {
    const d = CONSTANTS.DEFAULTS;
    const delegationEnabled = this.bool(env, 'DELEGATION_ENABLED', false);

    return {
      port: this.int(env, 'PORT', d.PORT),
      nodeEnv: env.NODE_ENV ?? 'development',
      corsOrigin: this.optional(env, 'CORS_ORIGIN'),
      rateLimitPerMinute: this.int(env, 'RATE_LIMIT_PER_MINUTE', d.RATE_LIMIT_PER_MINUTE),

      ledger: {
        rpcUrl: env.LEDGER_RPC_URL ?? '',
        wsUrl: this.optional(env, 'LEDGER_WS_URL'),
        chainId: this.int(env, 'CHAIN_ID', d.CHAIN_ID),
        callTimeoutMs: this.int(env, 'LEDGER_CALL_TIMEOUT_MS', d.LEDGER_CALL_TIMEOUT_MS),
      },

      access: {
        mode: this.accessMode(env),
        // validate() reports a missing asset contract; the zero address is a placeholder
        assetContract: this.address(env, 'ASSET_CONTRACT') ?? CONSTANTS.ZERO_ADDRESS,
        policyContract: this.address(env, 'ACCESS_POLICY_CONTRACT'),
        freeTokenId: this.bigint(env, 'FREE_TOKEN_ID', 0n),
        maxTokenId: this.bigint(env, 'MAX_TOKEN_ID', d.MAX_TOKEN_ID),
      },

      delegation: {
        enabled: delegationEnabled,
        delegateRegistry: this.bool(env, 'DELEGATE_REGISTRY_ENABLED', true)
          ? this.address(env, 'DELEGATE_REGISTRY') ?? CONSTANTS.DELEGATE_REGISTRY_V2
          : null,
        collectionRegistry: this.bool(env, 'COLLECTION_DELEGATION_ENABLED', true)
          ? this.address(env, 'COLLECTION_DELEGATION_REGISTRY') ?? CONSTANTS.COLLECTION_DELEGATION_REGISTRY
          : null,
        cacheTtlMs: this.int(env, 'DELEGATION_CACHE_TTL_MS', d.CACHE_TTL_MS),
      },

      siwe: {
        domain: env.SIWE_DOMAIN ?? d.SIWE_DOMAIN,
        uri: env.SIWE_URI ?? `https://${env.SIWE_DOMAIN ?? d.SIWE_DOMAIN}`,
        statement: env.SIWE_STATEMENT ?? d.SIWE_STATEMENT,
        challengeTtlMs: this.int(env, 'CHALLENGE_TTL_MS', d.CHALLENGE_TTL_MS),
        nonceLength: this.int(env, 'NONCE_LENGTH', d.NONCE_LENGTH),
      },

      sessions: {
        credentialTtlMs: this.int(env, 'CREDENTIAL_TTL_MS', d.CREDENTIAL_TTL_MS),
        tierCacheTtlMs: this.int(env, 'TIER_CACHE_TTL_MS', d.CACHE_TTL_MS),
      },

      tunnel: {
        interfaceName: env.WG_INTERFACE ?? d.WG_INTERFACE,
        serverPublicKey: env.WG_SERVER_PUBLIC_KEY ?? '',
        serverEndpoint: env.WG_SERVER_ENDPOINT ?? '',
        subnet: env.WG_SUBNET ?? d.WG_SUBNET,
        dns: env.WG_DNS ?? d.WG_DNS,
        allowedIps: env.WG_CLIENT_ALLOWED_IPS ?? d.WG_CLIENT_ALLOWED_IPS,
        commandTimeoutMs: this.int(env, 'WG_COMMAND_TIMEOUT_MS', d.WG_COMMAND_TIMEOUT_MS),
      },

      revocation: {
        backoffMs: this.int(env, 'REVOCATION_BACKOFF_MS', d.REVOCATION_BACKOFF_MS),
      },

      sessionManager: {
        contract: this.address(env, 'SESSION_MANAGER_CONTRACT'),
        operatorPrivateKey: this.privateKey(env, 'OPERATOR_PRIVATE_KEY'),
        nodeOperator: this.address(env, 'NODE_OPERATOR_ADDRESS'),
        freeSessionDurationSeconds: this.int(env, 'FREE_SESSION_DURATION_SECONDS', d.FREE_SESSION_DURATION_SECONDS),
      },

      subscriptionManager: {
        contract: this.address(env, 'SUBSCRIPTION_MANAGER_CONTRACT'),
      },

      ledgerWrites: {
        maxAttempts: this.int(env, 'LEDGER_WRITE_MAX_ATTEMPTS', d.LEDGER_WRITE_MAX_ATTEMPTS),
        retryDelayMs: this.int(env, 'LEDGER_WRITE_RETRY_DELAY_MS', d.LEDGER_WRITE_RETRY_DELAY_MS),
        maxPending: this.int(env, 'LEDGER_WRITE_MAX_PENDING', d.LEDGER_WRITE_MAX_PENDING),
      },

      nodes: {
        registryContract: this.address(env, 'NODE_REGISTRY_CONTRACT'),
        cacheTtlMs: this.int(env, 'NODE_CACHE_TTL_MS', d.NODE_CACHE_TTL_MS),
      },

      reputation: {
        apiUrl: this.optional(env, 'REP_API_URL'),
        category: env.REP_CATEGORY ?? d.REP_CATEGORY,
        minRep: this.int(env, 'REP_MIN', d.REP_MIN),
        cacheTtlMs: this.int(env, 'REP_CACHE_TTL_MS', d.CACHE_TTL_MS),
        timeoutMs: this.int(env, 'REP_TIMEOUT_MS', d.REP_TIMEOUT_MS),
        userBanCheck: this.bool(env, 'USER_BAN_CHECK', false),
        userBanCategory: env.USER_BAN_CATEGORY ?? d.USER_BAN_CATEGORY,
      },
    };
  }

  /**
   * Reject configurations the gateway cannot run with.
   * Call this during application startup.
   */
  public static validate(config: GatewayConfig): GatewayConfig {
    const problems: string[] = [];

    if (!config.ledger.rpcUrl) problems.push('LEDGER_RPC_URL is required');
    if (config.access.assetContract === CONSTANTS.ZERO_ADDRESS) problems.push('ASSET_CONTRACT is required');
    if (config.access.mode === 'policy' && !config.access.policyContract) {
      problems.push('ACCESS_POLICY_CONTRACT is required unless ACCESS_MODE=direct');
    }
    if (config.access.mode === 'direct' && config.access.maxTokenId < 1n) {
      problems.push('MAX_TOKEN_ID must be at least 1');
    }
    if (config.siwe.nonceLength < CONSTANTS.MIN_NONCE_LENGTH) {
      problems.push(`NONCE_LENGTH must be >= ${CONSTANTS.MIN_NONCE_LENGTH}`);
    }
    if (!/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/.test(config.tunnel.subnet)) {
      problems.push(`WG_SUBNET is not an IPv4 CIDR: ${config.tunnel.subnet}`);
    }
    if (config.tunnel.serverPublicKey && !SecurityUtil.isWireGuardPublicKey(config.tunnel.serverPublicKey)) {
      problems.push('WG_SERVER_PUBLIC_KEY is not a WireGuard public key');
    }

    const durations: Array<[string, number]> = [
      ['CHALLENGE_TTL_MS', config.siwe.challengeTtlMs],
      ['CREDENTIAL_TTL_MS', config.sessions.credentialTtlMs],
      ['TIER_CACHE_TTL_MS', config.sessions.tierCacheTtlMs],
      ['DELEGATION_CACHE_TTL_MS', config.delegation.cacheTtlMs],
      ['LEDGER_CALL_TIMEOUT_MS', config.ledger.callTimeoutMs],
      ['WG_COMMAND_TIMEOUT_MS', config.tunnel.commandTimeoutMs],
      ['REVOCATION_BACKOFF_MS', config.revocation.backoffMs],
      ['NODE_CACHE_TTL_MS', config.nodes.cacheTtlMs],
      ['REP_TIMEOUT_MS', config.reputation.timeoutMs],
      ['LEDGER_WRITE_MAX_ATTEMPTS', config.ledgerWrites.maxAttempts],
      ['LEDGER_WRITE_MAX_PENDING', config.ledgerWrites.maxPending],
      ['RATE_LIMIT_PER_MINUTE', config.rateLimitPerMinute],
    ];
    for (const [name, value] of durations) {
      if (!Number.isFinite(value) || value <= 0) problems.push(`${name} must be positive`);
    }

    if (problems.length > 0) {
      throw ErrorFactory.configuration(`Invalid configuration: ${problems.join('; ')}`);
    }
    return config;
  }

  /**
   * Configuration summary safe for startup logs.
   */
  public static getConfigInfo(config: GatewayConfig): Record<string, unknown> {
    return SecurityUtil.maskSensitiveData({
      nodeEnv: config.nodeEnv,
      chainId: config.ledger.chainId,
      accessMode: config.access.mode,
      assetContract: config.access.assetContract,
      delegation: config.delegation.enabled,
      revocationWatcher: config.ledger.wsUrl !== null,
      tunnelInterface: config.tunnel.interfaceName,
      subnet: config.tunnel.subnet,
      sessionManager: config.sessionManager.contract,
      subscriptionManager: config.subscriptionManager.contract,
      nodeRegistry: config.nodes.registryContract,
      reputation: config.reputation.apiUrl !== null,
      operatorPrivateKey: config.sessionManager.operatorPrivateKey ?? '',
    });
  }

  private static optional(env: Env, name: string): string | null {
    const value = env[name]?.trim();
    return value ? value : null;
  }

  private static int(env: Env, name: string, fallback: number): number {
    const raw = this.optional(env, name);
    if (raw === null) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw ErrorFactory.configuration(`${name} must be an integer, got "${raw}"`);
    }
    return value;
  }

  private static bigint(env: Env, name: string, fallback: bigint): bigint {
    const raw = this.optional(env, name);
    if (raw === null) return fallback;
    if (!/^\d+$/.test(raw)) {
      throw ErrorFactory.configuration(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw);
  }

  private static bool(env: Env, name: string, fallback: boolean): boolean {
    const raw = this.optional(env, name);
    if (raw === null) return fallback;
    return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
  }

  private static address(env: Env, name: string): Address | null {
    const raw = this.optional(env, name);
    if (raw === null) return null;
    if (!isAddress(raw, { strict: false })) {
      throw ErrorFactory.configuration(`${name} is not a valid address: ${raw}`);
    }
    return getAddress(raw);
  }

  private static privateKey(env: Env, name: string): Hex | null {
    const raw = this.optional(env, name);
    if (raw === null) return null;
    const prefixed = raw.startsWith('0x') ? raw : `0x${raw}`;
    if (!isHex(prefixed) || prefixed.length !== 66) {
      throw ErrorFactory.configuration(`${name} must be a 32-byte hex private key`);
    }
    return prefixed;
  }

  private static accessMode(env: Env): AccessCheckMode {
    const raw = (this.optional(env, 'ACCESS_MODE') ?? 'policy').toLowerCase();
    if (raw !== 'policy' && raw !== 'direct') {
      throw ErrorFactory.configuration(`ACCESS_MODE must be "policy" or "direct", got "${raw}"`);
    }
    return raw;
  }
}
