import {
  globalInterceptor,
  inject,
  Interceptor,
  InvocationContext,
  InvocationResult,
  Provider,
  ValueOrPromise,
} from '@loopback/core';
import type {WinstonLogger} from '@loopback/logging';
import {HttpErrors, RestBindings} from '@loopback/rest';
import type {Request} from '@loopback/rest';

import {ErrorBindings, LoggerBindings} from '../key';
import {ErrorService} from '../services/error.service';

/**
 * Reports errors escaping controller methods. Client errors (4xx) are
 * rethrown untouched.
 */
@globalInterceptor('', {tags: {name: 'ErrorReporting'}})
export class ErrorReportingInterceptor implements Provider<Interceptor> {
  constructor(
    @inject(LoggerBindings.ROOT_LOGGER) private logger: WinstonLogger,
    @inject(ErrorBindings.ERROR_SERVICE) private errorService: ErrorService,
    @inject(RestBindings.Http.REQUEST, {optional: true})
    private req?: Request,
  ) {}

  value() {
    return this.intercept.bind(this);
  }

  async intercept(
    invocationCtx: InvocationContext,
    next: () => ValueOrPromise<InvocationResult>,
  ) {
    try {
      return await next();
    } catch (err) {
      if (ErrorReportingInterceptor.isReportable(err)) {
        this.logger.warn(
          `request error in ${invocationCtx.targetName}`,
          err,
        );
        this.errorService.reportRequestError(err, this.req);
      }

      throw err;
    }
  }

  static isReportable(err: unknown): err is Error {
    if (!(err instanceof Error)) {
      return false;
    }
    return !(err instanceof HttpErrors.HttpError && err.status < 500);
  }
}
