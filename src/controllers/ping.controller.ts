import {inject} from '@loopback/core';
import {get, RestBindings} from '@loopback/rest';
import type {Request, ResponseObject} from '@loopback/rest';

const OAS_CONTROLLER_NAME = 'Public';

/**
 * OpenAPI response for ping()
 */
const PING_RESPONSE: ResponseObject = {
  description: 'Ping Response',
  content: {
    'application/json': {
      schema: {
        type: 'object',
        title: 'PingResponse',
        properties: {
          pong: {type: 'string'},
          date: {type: 'string'},
          url: {type: 'string'},
        },
      },
    },
  },
};

/**
 * A simple controller to bounce back http requests
 */
export class PingController {
  constructor(@inject(RestBindings.Http.REQUEST) private req: Request) {}

  // Map to `GET /ping`
  @get('/ping', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'ping',
    responses: {
      '200': PING_RESPONSE,
    },
  })
  ping(): object {
    return {
      pong: 'pong',
      date: new Date(),
      url: this.req.url,
    };
  }
}
