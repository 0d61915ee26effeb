/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Tokens travel in JSON bodies (login/refresh) and the Bearer header (logout/me).
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireAuth } from '../../shared/http/require-auth-context';
import { loginSchema, logoutSchema, refreshSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const parsed = refreshSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const pair = await this.authService.refresh({
      refreshToken: parsed.data.refreshToken,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(pair);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);

    const parsed = logoutSchema.safeParse(req.body ?? undefined);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.authService.logout({
      accessToken: auth.rawToken,
      refreshToken: parsed.data?.refreshToken ?? null,
      userId: auth.userId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({ message: 'Logged out' });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuth(req);

    return reply.status(200).send({
      userId: auth.userId,
      organizationId: auth.organizationId,
      role: auth.role,
    });
  }
}
