import {BindingKey} from '@loopback/core';
import {LoggingBindings} from '@loopback/logging';
import type {WinstonLogger} from '@loopback/logging';
import type {ErrorService} from './services/error.service';
import type {
  AppCustomCatalogConfig,
  AppCustomConfig,
  AppCustomPaginationConfig,
} from './utils/configuration-utils';

export namespace ConfigurationBindings {
  export const ROOT_CONFIG = BindingKey.create<AppCustomConfig>(
    'productcatalog.config.root',
  );
  export const PAGINATION_CONFIG = BindingKey.create<AppCustomPaginationConfig>(
    'productcatalog.config.pagination',
  );
  export const CATALOG_CONFIG = BindingKey.create<AppCustomCatalogConfig>(
    'productcatalog.config.catalog',
  );
}

export namespace LoggerBindings {
  export const ROOT_LOGGER = LoggingBindings.WINSTON_LOGGER;
  export const DATASOURCE_LOGGER = BindingKey.create<WinstonLogger>(
    'productcatalog.logger.datasource',
  );
  export const SERVICE_LOGGER = BindingKey.create<WinstonLogger>(
    'productcatalog.logger.service',
  );
}

export namespace ErrorBindings {
  export const ERROR_SERVICE = BindingKey.create<ErrorService>(
    'productcatalog.error.service',
  );
}
