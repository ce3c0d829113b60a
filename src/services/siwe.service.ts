import { Inject, Injectable, Logger } from '@nestjs/common';
import { getAddress, isAddress, isHex, isAddressEqual, recoverMessageAddress, Address, Hex } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../config/environment.config';
import { Challenge, IssuedChallenge, VerifiedIdentity } from '../models/app.interface';
import { ErrorFactory, errorMessage } from '../utils/error-handling.util';
import { SecurityUtil } from '../utils/security.util';
import { NonceService } from './nonce.service';

const HEADER_SUFFIX = ' wants you to sign in with your Ethereum account:';

/**
 * Fields read back out of a signed EIP-4361 message.
 */
export interface ParsedSignInMessage {
  domain: string;
  address: string;
  uri?: string;
  chainId?: number;
  nonce: string;
  issuedAt?: string;
  expirationTime?: string;
}

/**
 * SiweService
 *
 * Formats Sign-In with Ethereum (EIP-4361) challenges and verifies the
 * personal-message signatures over them.
 */
@Injectable()
export class SiweService {
  private readonly logger = new Logger(SiweService.name);

  constructor(
    @Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig,
    private readonly nonces: NonceService,
  ) {}

  /**
   * Issues a challenge for `address` and returns the exact text the wallet
   * must sign. The embedded nonce is pending until verified or expired.
   */
  issueChallenge(address: string): IssuedChallenge {
    if (!isAddress(address, { strict: false })) {
      throw ErrorFactory.validation('invalid address');
    }

    const issuedAt = new Date();
    const challenge: Challenge = {
      domain: this.config.siwe.domain,
      address: getAddress(address),
      statement: this.config.siwe.statement,
      uri: this.config.siwe.uri,
      version: '1',
      chainId: this.config.ledger.chainId,
      nonce: this.nonces.issue(),
      issuedAt: issuedAt.toISOString(),
    };

    const expiresAt = new Date(issuedAt.getTime() + this.config.siwe.challengeTtlMs);
    return { challenge, message: SiweService.formatMessage(challenge, expiresAt) };
  }

  /**
   * Recovers the signer of `message` and checks it against the message's own
   * claims and the pending nonce. The nonce is consumed last, so a request
   * failing any other check leaves it usable.
   *
   * @throws authentication error (HTTP 401) on any mismatch
   */
  async verifySignedMessage(message: string, signature: string): Promise<VerifiedIdentity> {
    if (!isHex(signature)) {
      throw ErrorFactory.authentication('invalid signature');
    }

    const recovered = await this.recoverSigner(message, signature);
    const parsed = SiweService.parseMessage(message);

    if (parsed.domain !== this.config.siwe.domain) {
      throw ErrorFactory.authentication('domain mismatch');
    }
    if (parsed.uri !== this.config.siwe.uri) {
      throw ErrorFactory.authentication('uri mismatch');
    }
    if (!isAddress(parsed.address, { strict: false }) || !isAddressEqual(parsed.address, recovered)) {
      throw ErrorFactory.authentication('signature does not match address');
    }
    if (parsed.chainId !== undefined && parsed.chainId !== this.config.ledger.chainId) {
      throw ErrorFactory.authentication('chain id mismatch');
    }
    if (parsed.expirationTime !== undefined && !(Date.parse(parsed.expirationTime) >= Date.now())) {
      throw ErrorFactory.authentication('sign-in message expired');
    }
    if (!this.nonces.consume(parsed.nonce)) {
      throw ErrorFactory.authentication('invalid or expired nonce');
    }

    this.logger.debug(`Verified sign-in for ${SecurityUtil.mask(recovered)}`);
    return { address: recovered };
  }

  static formatMessage(challenge: Challenge, expiresAt?: Date): string {
    const lines = [
      `${challenge.domain}${HEADER_SUFFIX}`,
      challenge.address,
      '',
      challenge.statement,
      '',
      `URI: ${challenge.uri}`,
      `Version: ${challenge.version}`,
      `Chain ID: ${challenge.chainId}`,
      `Nonce: ${challenge.nonce}`,
      `Issued At: ${challenge.issuedAt}`,
    ];
    if (expiresAt) {
      lines.push(`Expiration Time: ${expiresAt.toISOString()}`);
    }
    return lines.join('\n');
  }

  /**
   * @throws authentication error when the header, address or nonce line is missing
   */
  static parseMessage(message: string): ParsedSignInMessage {
    const lines = message.split('\n');
    const header = lines[0] ?? '';
    if (lines.length < 2 || !header.endsWith(HEADER_SUFFIX)) {
      throw ErrorFactory.authentication('malformed sign-in message');
    }

    const fields = new Map<string, string>();
    for (const line of lines.slice(2)) {
      const separator = line.indexOf(': ');
      if (separator > 0) {
        fields.set(line.substring(0, separator), line.substring(separator + 2));
      }
    }

    const nonce = fields.get('Nonce');
    if (!nonce) {
      throw ErrorFactory.authentication('malformed sign-in message: missing nonce');
    }

    const chainId = fields.get('Chain ID');
    return {
      domain: header.substring(0, header.length - HEADER_SUFFIX.length),
      address: lines[1].trim(),
      uri: fields.get('URI'),
      chainId: chainId !== undefined ? Number(chainId) : undefined,
      nonce,
      issuedAt: fields.get('Issued At'),
      expirationTime: fields.get('Expiration Time'),
    };
  }

  private async recoverSigner(message: string, signature: Hex): Promise<Address> {
    try {
      return await recoverMessageAddress({ message, signature });
    } catch (error) {
      this.logger.debug(`Signature recovery failed: ${errorMessage(error)}`);
      throw ErrorFactory.authentication('invalid signature');
    }
  }
}
