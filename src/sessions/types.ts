import type { FastifyRequest } from 'fastify';

export type SessionPrincipal = {
  userId: string;
};

export type IssuedSession = {
  token: string;
  userId: string;
};

export type AuthenticatedRequest = FastifyRequest & {
  principal?: SessionPrincipal & { token: string };
};
