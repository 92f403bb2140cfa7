import {CoreBindings} from '@loopback/core';
import {HealthComponent, HealthTags} from '@loopback/health';
import {
  format,
  LoggingBindings,
  LoggingComponent,
  WinstonTransports,
} from '@loopback/logging';
import {RepositoryMixin} from '@loopback/repository';
import {RestApplication, RestBindings} from '@loopback/rest';
import {
  RestExplorerBindings,
  RestExplorerComponent,
} from '@loopback/rest-explorer';
import {ServiceMixin} from '@loopback/service-proxy';
import winston from 'winston';
import {PingController, ProductController} from './controllers';
import {MemoryDataSource} from './datasources';
import {ProductStoreHealthCheckProvider} from './health/product-store.healthcheck';
import {ErrorReportingInterceptor} from './interceptors';
import {ConfigurationBindings, ErrorBindings, LoggerBindings} from './key';
import {ProductSeedObserver} from './observers';
import {ProductRepository} from './repositories';
import {MySequence} from './sequence';
import {ErrorService, MapperService, ProductService} from './services';
import {AppCustomConfig} from './utils/configuration-utils';

export class ProductCatalogApplication extends ServiceMixin(
  RepositoryMixin(RestApplication),
) {
  constructor(options: AppCustomConfig) {
    super(options);

    // Set up the custom sequence
    this.sequence(MySequence);

    // configure logging system
    this.configureLogging(options);

    // configure error handling
    this.configureErrorHandling(options);

    // configure rest explorer
    this.configureRestExplorer();

    // bind configuration
    this.bindConfiguration(options);

    // register datasources, repositories, services and controllers
    this.configureArtifacts();

    // configure health check
    this.configureHealthChecks();
  }

  private configureErrorHandling(options: AppCustomConfig) {
    this.bind(RestBindings.ERROR_WRITER_OPTIONS).to({
      debug: options.security.exposeErrorDetails,
    });

    this.bind(ErrorBindings.ERROR_SERVICE).toClass(ErrorService);

    this.interceptor(ErrorReportingInterceptor, {global: true});
  }

  private configureLogging(options: AppCustomConfig) {
    this.configure(LoggingBindings.COMPONENT).to({
      enableFluent: false,
      enableHttpAccessLog: options.logging.enableHttpAccessLog,
    });

    const transportProvider = (level: string) =>
      new WinstonTransports.Console({
        level,
        format: format.combine(format.colorize(), format.simple()),
      });

    const standardFormat = format.combine(format.colorize(), format.simple());

    this.configure(LoggerBindings.ROOT_LOGGER).to({
      level: options.logging.rootLevel,
      format: standardFormat,
    });

    this.bind(LoggerBindings.DATASOURCE_LOGGER).to(
      winston.createLogger({
        transports: [transportProvider(options.logging.datasourceLevel)],
        format: standardFormat,
      }),
    );

    this.bind(LoggerBindings.SERVICE_LOGGER).to(
      winston.createLogger({
        transports: [transportProvider(options.logging.serviceLevel)],
        format: standardFormat,
      }),
    );

    this.component(LoggingComponent);
  }

  private configureRestExplorer() {
    this.component(RestExplorerComponent);

    this.configure(RestExplorerBindings.COMPONENT).to({
      path: '/explorer',
    });
  }

  private bindConfiguration(options: AppCustomConfig) {
    this.bind(ConfigurationBindings.ROOT_CONFIG).to(options);

    this.bind(ConfigurationBindings.PAGINATION_CONFIG).to(options.pagination);

    this.bind(ConfigurationBindings.CATALOG_CONFIG).to(options.catalog);
  }

  private configureArtifacts() {
    // datasources come up before the catalog is seeded, the server last
    this.configure(CoreBindings.LIFE_CYCLE_OBSERVER_REGISTRY).to({
      orderedGroups: ['datasource', 'seed', 'server'],
    });

    this.dataSource(MemoryDataSource);
    this.repository(ProductRepository);

    this.service(MapperService);
    this.service(ProductService);

    this.controller(PingController);
    this.controller(ProductController);

    this.lifeCycleObserver(ProductSeedObserver);
  }

  private configureHealthChecks() {
    this.component(HealthComponent);

    this.bind('health.ProductStoreHealthCheckProvider')
      .toProvider(ProductStoreHealthCheckProvider)
      .tag(HealthTags.READY_CHECK);
  }
}
