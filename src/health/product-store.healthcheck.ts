import {inject, Provider} from '@loopback/core';
import type {ReadyCheck} from '@loopback/health';
import type {WinstonLogger} from '@loopback/logging';
import {repository} from '@loopback/repository';
import {LoggerBindings} from '../key';
import {ProductRepository} from '../repositories';

export class ProductStoreHealthCheckProvider implements Provider<ReadyCheck> {
  constructor(
    @inject(LoggerBindings.ROOT_LOGGER) private logger: WinstonLogger,
    @repository(ProductRepository)
    private productRepository: ProductRepository,
  ) {
    // NOP
  }

  value(): ReadyCheck {
    return async () => {
      this.logger.debug('checking product store health status');
      await this.productRepository.count();
    };
  }
}
