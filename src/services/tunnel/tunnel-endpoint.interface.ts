/** Injection token for the {@link TunnelEndpoint} the peer manager drives. */
export const TUNNEL_ENDPOINT = 'TUNNEL_ENDPOINT';

/**
 * The tunnel server's peer table.
 */
export interface TunnelEndpoint {
  /** Accept `publicKey` with `allowedIp` (a single /32) as its only source address. */
  configurePeer(publicKey: string, allowedIp: string): Promise<void>;
  removePeer(publicKey: string): Promise<void>;
}
