/**
 * Sample application routes, mounted under the route prefix
 * - GET /: public greeting
 * - GET /hello/:name: greeting for signed-in users
 */

import { Type, type Static } from '@sinclair/typebox';

import { escapeHtml } from '../modules/auth/core/login-page.js';

import type { AuthGate } from '../modules/auth/shell/middleware/fastify-auth.js';
import type { FastifyPluginAsync } from 'fastify';

const HelloParamsSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
});

type HelloParams = Static<typeof HelloParamsSchema>;

export interface MakeSampleRoutesDeps {
  gate: AuthGate;
  /** Name under which the gate injects the identity */
  injectedParamName: string;
}

export const makeSampleRoutes = (deps: MakeSampleRoutesDeps): FastifyPluginAsync => {
  const { gate, injectedParamName } = deps;

  return async (fastify) => {
    fastify.get('/', async (_request, reply) => {
      return reply.type('text/html; charset=utf-8').send('<h3>Hello world</h3>');
    });

    fastify.get<{ Params: HelloParams }>(
      '/hello/:name',
      {
        schema: {
          params: HelloParamsSchema,
        },
      },
      gate.protect<{ Params: HelloParams }>(async (request, reply, injected) => {
        const user = injected[injectedParamName];

        return reply
          .type('text/html; charset=utf-8')
          .send(
            `<p>Hello <b>${escapeHtml(request.params.name)}</b></p>` +
              `<p>Signed in as ${escapeHtml(user.username)}</p>`
          );
      })
    );
  };
};
