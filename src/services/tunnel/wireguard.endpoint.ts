import { Inject, Injectable, Logger } from '@nestjs/common';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { ErrorFactory, errorMessage } from '../../utils/error-handling.util';
import { SecurityUtil } from '../../utils/security.util';
import { TunnelEndpoint } from './tunnel-endpoint.interface';

const execFileAsync = promisify(execFile);

/**
 * Drives the WireGuard interface through the `wg` command line tool.
 * Each invocation is bounded by `WG_COMMAND_TIMEOUT_MS`.
 */
@Injectable()
export class WireGuardEndpoint implements TunnelEndpoint {
  private readonly logger = new Logger(WireGuardEndpoint.name);

  constructor(@Inject(GATEWAY_CONFIG) private readonly config: GatewayConfig) {}

  async configurePeer(publicKey: string, allowedIp: string): Promise<void> {
    await this.wg(['set', this.config.tunnel.interfaceName, 'peer', publicKey, 'allowed-ips', allowedIp]);
    this.logger.log(`Peer ${SecurityUtil.mask(publicKey)} allowed ${allowedIp}`);
  }

  async removePeer(publicKey: string): Promise<void> {
    await this.wg(['set', this.config.tunnel.interfaceName, 'peer', publicKey, 'remove']);
    this.logger.log(`Peer ${SecurityUtil.mask(publicKey)} removed`);
  }

  private async wg(args: string[]): Promise<void> {
    if (!SecurityUtil.isWireGuardPublicKey(args[3])) {
      throw ErrorFactory.validation('invalid WireGuard public key');
    }
    try {
      await execFileAsync('wg', args, { timeout: this.config.tunnel.commandTimeoutMs });
    } catch (error) {
      throw ErrorFactory.upstream(`wg ${args[0]} failed: ${errorMessage(error)}`, {
        interface: this.config.tunnel.interfaceName,
      });
    }
  }
}
