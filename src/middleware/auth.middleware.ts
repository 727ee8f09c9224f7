import { FastifyRequest, FastifyReply, RouteGenericInterface } from 'fastify';
import jwt from 'jsonwebtoken';
import { config } from '../config';
import { AuthorizationError } from '../errors';
import { Address, isAddress } from '../utils/address';

export interface AuthUser {
  /** Ledger address of the caller, taken from the token subject */
  address: Address;
  roles: string[];
}

export interface AuthRequest<T extends RouteGenericInterface = RouteGenericInterface> extends FastifyRequest<T> {
  user?: AuthUser;
}

function decodeUser(token: string): AuthUser | null {
  const decoded = jwt.verify(token, config.jwtSecret);
  if (typeof decoded === 'string' || typeof decoded.sub !== 'string' || !isAddress(decoded.sub)) {
    return null;
  }
  const roles: unknown = decoded.roles;
  return {
    address: decoded.sub.toLowerCase(),
    roles: Array.isArray(roles) ? roles.filter((role): role is string => typeof role === 'string') : []
  };
}

// Standard authentication middleware
export async function authMiddleware(request: AuthRequest, reply: FastifyReply) {
  const token = request.headers.authorization?.replace('Bearer ', '');

  if (!token) {
    return reply.status(401).send({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Authentication required' }
    });
  }

  let user: AuthUser | null = null;
  try {
    user = decodeUser(token);
  } catch (error) {
    user = null;
  }

  if (!user) {
    return reply.status(401).send({
      success: false,
      error: { code: 'INVALID_TOKEN', message: 'Invalid token' }
    });
  }
  request.user = user;
}

// Admin middleware
export async function requireAdmin(request: AuthRequest, reply: FastifyReply) {
  if (!request.user?.roles.includes('admin')) {
    return reply.status(403).send({
      success: false,
      error: { code: 'UNAUTHORIZED', message: 'Admin access required' }
    });
  }
}

/**
 * The authenticated caller; routes reaching this without authMiddleware fail.
 */
export function getUser(request: AuthRequest): AuthUser {
  if (!request.user) {
    throw AuthorizationError.invalidToken();
  }
  return request.user;
}
