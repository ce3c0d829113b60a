/**
 * Application-wide constants
 *
 * Defaults for every tunable the environment can override, plus fixed
 * protocol values (well-known registry addresses, event signatures).
 */
export const CONSTANTS = {
  ZERO_ADDRESS: '0x0000000000000000000000000000000000000000',

  // Well-known delegation registries (same address on every EVM chain)
  DELEGATE_REGISTRY_V2: '0x00000000000000447e69651d841bD8D104Bed493',
  COLLECTION_DELEGATION_REGISTRY: '0x2202CB9c00487e7e8EF21e6d8E914B32e709f43d',

  // Delegation types understood from the v2 registry
  DELEGATION_TYPE: {
    ALL: 1,
    CONTRACT: 2,
  },
  /** Use case id for "all" delegations in the collection registry. */
  COLLECTION_DELEGATION_USE_CASE: 1n,

  // Shortest nonce accepted for sign-in challenges, in bytes
  MIN_NONCE_LENGTH: 8,

  // Token ids per balanceOfBatch call in direct mode
  BALANCE_BATCH_SIZE: 50,

  DEFAULTS: {
    PORT: 8080,
    CHAIN_ID: 11155111,
    RATE_LIMIT_PER_MINUTE: 30,
    LEDGER_CALL_TIMEOUT_MS: 10_000,
    MAX_TOKEN_ID: 350n,

    SIWE_DOMAIN: 'localhost',
    SIWE_STATEMENT: 'Sign in to the tunnel gateway. This request will not trigger a transaction or cost any fees.',
    CHALLENGE_TTL_MS: 5 * 60_000,
    NONCE_LENGTH: 16,

    CREDENTIAL_TTL_MS: 24 * 60 * 60_000,
    CACHE_TTL_MS: 5 * 60_000,
    NODE_CACHE_TTL_MS: 2 * 60_000,
    SWEEP_INTERVAL_MS: 60_000,
    REVOCATION_BACKOFF_MS: 10_000,

    WG_INTERFACE: 'wg0',
    WG_SUBNET: '10.8.0.0/24',
    WG_DNS: '1.1.1.1',
    WG_CLIENT_ALLOWED_IPS: '0.0.0.0/0, ::/0',
    WG_COMMAND_TIMEOUT_MS: 5_000,

    FREE_SESSION_DURATION_SECONDS: 24 * 60 * 60,
    LEDGER_WRITE_MAX_ATTEMPTS: 3,
    LEDGER_WRITE_RETRY_DELAY_MS: 2_000,
    LEDGER_WRITE_MAX_PENDING: 100,

    REP_CATEGORY: 'Node Operator',
    REP_MIN: 50_000,
    REP_TIMEOUT_MS: 10_000,
    USER_BAN_CATEGORY: 'Tunnel User',
  },

  // Throttler window for the per-minute limit
  RATE_LIMIT_WINDOW_MS: 60_000,

  // Upper bound on in-memory cache entries
  CACHE_MAX_ENTRIES: 10_000,
} as const;
