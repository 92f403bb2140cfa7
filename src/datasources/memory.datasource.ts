import {inject, lifeCycleObserver, LifeCycleObserver} from '@loopback/core';
import type {WinstonLogger} from '@loopback/logging';
import {juggler} from '@loopback/repository';
import {LoggerBindings} from '../key';

const config = {
  name: 'Memory',
  connector: 'memory',
};

// Observe application's life cycle to disconnect the datasource when
// application is stopped. The `stop()` method is inherited from
// `juggler.DataSource`.
@lifeCycleObserver('datasource')
export class MemoryDataSource
  extends juggler.DataSource
  implements LifeCycleObserver
{
  static dataSourceName = 'Memory';
  static readonly defaultConfig = config;

  constructor(
    @inject(LoggerBindings.DATASOURCE_LOGGER) private logger: WinstonLogger,
  ) {
    super(config);
  }

  start(): void {
    this.logger.debug(`datasource ${this.name} ready`);
  }
}
