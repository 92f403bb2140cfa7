import Rollbar from 'rollbar';

import {inject} from '@loopback/core';
import type {WinstonLogger} from '@loopback/logging';
import type {Request} from '@loopback/rest';

import {ConfigurationBindings, LoggerBindings} from '../key';
import type {AppCustomConfig} from '../utils/configuration-utils';

export interface ReportedRequest {
  method: string;
  url: string;
  headers: Request['headers'];
}

export class ErrorService {
  rollbar: Rollbar;

  constructor(
    @inject(LoggerBindings.ROOT_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.ROOT_CONFIG)
    private configuration: AppCustomConfig,
  ) {
    this.rollbar = new Rollbar({
      accessToken: configuration.errorHandling.rollbarToken,
      enabled: configuration.errorHandling.enableRollbar,
      captureUncaught: false,
      captureUnhandledRejections: false,
      environment: configuration.envName,
    });
  }

  get rollbarEnabled(): boolean {
    return this.configuration.errorHandling.enableRollbar;
  }

  reportRequestError(error: Error, request: Request | undefined): void {
    if (!this.rollbarEnabled) {
      this.logger.warn('error reporting to rollbar is disabled.');
      this.logger.warn('reported error would be: ' + error.message);
      return;
    }

    this.safe(() =>
      this.rollbar.error(
        error,
        request ? this.toReportedRequest(request) : undefined,
      ),
    );
  }

  private safe(task: () => void) {
    try {
      task();
    } catch (err) {
      this.logger.error('ERROR REPORTING TO ROLLBAR', err);
    }
  }

  private toReportedRequest(input: Request): ReportedRequest {
    return {
      method: input.method,
      url: input.originalUrl,
      headers: input.headers,
    };
  }
}
