import { Global, Module } from '@nestjs/common';
import { EnvironmentConfig, GATEWAY_CONFIG } from './environment.config';

/**
 * Loads and validates the gateway configuration once; startup fails on
 * the first invalid setting set.
 */
@Global()
@Module({
  providers: [
    {
      provide: GATEWAY_CONFIG,
      useFactory: () => EnvironmentConfig.validate(EnvironmentConfig.load()),
    },
  ],
  exports: [GATEWAY_CONFIG],
})
export class GatewayConfigModule {}
