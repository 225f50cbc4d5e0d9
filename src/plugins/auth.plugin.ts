// ============================================
// VOTESHIELD - Auth Plugin
// ============================================

import { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env.js';
import { UnauthorizedError } from './error-handler.plugin.js';

const jwtPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
  role: z.enum(['user', 'admin']),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type JwtPayload = z.infer<typeof jwtPayloadSchema>;

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
  interface FastifyInstance {
    authenticate: (request: FastifyRequest) => Promise<void>;
    optionalAuth: (request: FastifyRequest) => Promise<void>;
  }
}

export function signToken(payload: Omit<JwtPayload, 'iat' | 'exp'>): string {
  return jwt.sign(payload, env.JWT_SECRET, { expiresIn: env.JWT_EXPIRES_IN_SECONDS });
}

export function verifyToken(token: string): JwtPayload {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, env.JWT_SECRET);
  } catch {
    throw new UnauthorizedError('Invalid or expired token');
  }

  const parsed = jwtPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new UnauthorizedError('Invalid token payload');
  }
  return parsed.data;
}

function bearerToken(request: FastifyRequest): string | null {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.substring(7);
}

const authPluginImpl: FastifyPluginAsync = async (fastify) => {
  // Require authentication
  fastify.decorate('authenticate', async (request: FastifyRequest) => {
    const token = bearerToken(request);
    if (!token) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }
    request.user = verifyToken(token);
  });

  // Anonymous voting is allowed, but a token that is present must be valid
  fastify.decorate('optionalAuth', async (request: FastifyRequest) => {
    const token = bearerToken(request);
    if (token) {
      request.user = verifyToken(token);
    }
  });
};

// Wrap with fastify-plugin to share decorators across encapsulation boundaries
export const authPlugin = fp(authPluginImpl, {
  name: 'voteshield-auth',
});
