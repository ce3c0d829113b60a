import { Provider } from '@nestjs/common';
import { PublicClient } from 'viem';
import { GATEWAY_CONFIG, GatewayConfig } from '../../config/environment.config';
import { PUBLIC_CLIENT } from '../ledger-client.provider';
import { CollectionDelegationReader } from './collection-delegation.reader';
import { DelegateRegistryReader } from './delegate-registry.reader';
import { DELEGATION_REGISTRIES, DelegationRegistry } from './delegation-registry.interface';

export * from './delegation-registry.interface';
export { CollectionDelegationReader } from './collection-delegation.reader';
export { DelegateRegistryReader } from './delegate-registry.reader';

/**
 * Registry readers enabled by configuration; empty when delegation is off.
 */
export const delegationRegistriesProvider: Provider = {
  provide: DELEGATION_REGISTRIES,
  inject: [GATEWAY_CONFIG, PUBLIC_CLIENT],
  useFactory: (config: GatewayConfig, client: PublicClient): DelegationRegistry[] => {
    if (!config.delegation.enabled) {
      return [];
    }
    const registries: DelegationRegistry[] = [];
    if (config.delegation.delegateRegistry) {
      registries.push(new DelegateRegistryReader(client, config.delegation.delegateRegistry, config));
    }
    if (config.delegation.collectionRegistry) {
      registries.push(new CollectionDelegationReader(client, config.delegation.collectionRegistry, config));
    }
    return registries;
  },
};
