import { IsEthereumAddress, IsString, Matches } from 'class-validator';
import { SecurityUtil } from '../utils/security.util';

/**
 * Body of `POST /vpn/connect` and `POST /vpn/disconnect`. The session
 * token is the wallet address returned by `/auth/verify`.
 */
export class PeerRequestDto {
  @IsEthereumAddress({ message: 'session_token must be a wallet address' })
  session_token!: string;

  @IsString()
  @Matches(SecurityUtil.WIREGUARD_KEY_PATTERN, { message: 'public_key must be a WireGuard public key' })
  public_key!: string;
}

export class SessionTokenQueryDto {
  @IsEthereumAddress({ message: 'session_token must be a wallet address' })
  session_token!: string;
}
