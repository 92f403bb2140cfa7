import fs from 'fs';
import lodash from 'lodash';

import type {ApplicationConfig} from '@loopback/core';

import {ObjectUtils} from './object-utils';
import {StringUtils} from './string-utils';

export interface AppCustomConfig extends ApplicationConfig {
  appCode: string;
  envName: string;
  security: AppCustomSecurityConfig;
  logging: AppCustomLoggingConfig;
  errorHandling: AppCustomErrorHandlingConfig;
  pagination: AppCustomPaginationConfig;
  catalog: AppCustomCatalogConfig;
}

export interface AppCustomErrorHandlingConfig {
  enableRollbar: boolean;
  rollbarToken: string;
}

export interface AppCustomLoggingConfig {
  rootLevel: string;
  datasourceLevel: string;
  serviceLevel: string;
  enableHttpAccessLog: boolean;
}

export interface AppCustomSecurityConfig {
  exposeErrorDetails: boolean;
}

export interface AppCustomPaginationConfig {
  /** Page size applied when the request does not specify one. */
  defaultPageSize: number;
  /** Largest page size a request may ask for. */
  maxPageSize: number;
}

export interface AppCustomCatalogConfig {
  seedProducts: AppCustomSeedProduct[];
}

export interface AppCustomSeedProduct {
  name: string;
  price: number;
}

export abstract class ConfigurationUtils {
  private static commonConfiguration: Partial<AppCustomConfig> =
    ConfigurationUtils.requireConfigurationFromFile('config-common.json');

  static buildConfiguration(
    envName: string | undefined = undefined,
  ): AppCustomConfig {
    if (!envName) {
      envName = ConfigurationUtils.getEnv();
    }

    const configFile = `config-${envName.toLowerCase()}.json`;
    const profiledConfiguration =
      ConfigurationUtils.readConfigurationFromFile(configFile);

    if (!profiledConfiguration) {
      throw new Error(
        `Missing profile configuration. Is the profile "${envName.toLowerCase()}" correct? Is the configuration file "${configFile}" present?`,
      );
    }

    const merged = lodash.merge(
      lodash.merge({}, this.commonConfiguration),
      profiledConfiguration,
    );

    // replace placeholders
    const stringified = StringUtils.format(JSON.stringify(merged), k =>
      this.resolveProperty(k),
    );

    return JSON.parse(stringified);
  }

  static resolveProperty(key: string): string | null {
    if (!key.toLowerCase().startsWith('env.')) {
      return null;
    }

    const resolved = process.env[key.substring(4)];
    if (!ObjectUtils.isDefined(resolved)) {
      return null;
    }

    // the value lands inside a JSON string literal
    const escaped = JSON.stringify(resolved);
    return escaped.substring(1, escaped.length - 1);
  }

  static getEnv(): string {
    const key = 'NODE_ENV';
    return (
      process.env[
        key + '_' + ObjectUtils.require(this.commonConfiguration, 'appCode')
      ] ??
      process.env[key] ??
      'local'
    );
  }

  static readConfigurationFromFile(
    name: string,
  ): Partial<AppCustomConfig> | null {
    const fullpath = './src/config/' + name;
    if (!fs.existsSync(fullpath)) {
      return null;
    }
    return JSON.parse(fs.readFileSync(fullpath).toString());
  }

  static requireConfigurationFromFile(name: string): Partial<AppCustomConfig> {
    const read = ConfigurationUtils.readConfigurationFromFile(name);
    if (!read) {
      throw new Error('File not found: ./src/config/' + name);
    }
    return read;
  }
}
