/**
 * JWT Plugin
 *
 * Registers @fastify/jwt for verifying access tokens issued by the identity
 * service. Also decorates the Fastify instance with an authenticate preHandler.
 */

import jwt from '@fastify/jwt';
import type { FastifyInstance, FastifyRequest } from 'fastify';

import { env } from '../lib/env';
import { UnauthorizedError } from '../lib/errors';
import { requestContext } from '../lib/logger';
import type { UserRole } from '../lib/user-directory';

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: { sub: string; roles?: UserRole[] };
    user: { id: string; roles: UserRole[] };
  }
}

// Extend FastifyInstance to include the authenticate decorator
declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest) => Promise<void>;
  }
}

export async function registerJwt(app: FastifyInstance, secret: string = env.JWT_SECRET): Promise<void> {
  await app.register(jwt, {
    secret,
    sign: {
      algorithm: 'HS256',
    },
    verify: {
      algorithms: ['HS256'],
    },
    formatUser: (payload) => ({
      id: payload.sub,
      roles: payload.roles ?? ['user'],
    }),
  });

  app.decorate('authenticate', async function (request: FastifyRequest) {
    const authHeader = request.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    try {
      await request.jwtVerify();
    } catch (err) {
      request.log.debug({ err }, 'Access token rejected');
      throw new UnauthorizedError('Invalid or expired access token');
    }

    // Tag the rest of the request's log lines with the caller
    const store = requestContext.getStore();
    if (store) {
      store.userId = request.user.id;
      store.logger = store.logger.child({ userId: request.user.id });
      request.log = store.logger;
    }
  });
}
