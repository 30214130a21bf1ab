import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from "fastify";

export class AuthService {
  // Accepts "Bearer <token>" when <token> equals the configured API token.
  static validateToken(authHeader: string | undefined, expectedToken: string | undefined): boolean {
    if (!expectedToken || !authHeader || !authHeader.startsWith("Bearer ")) {
      return false;
    }

    const token = authHeader.substring(7).trim();
    return token.length > 0 && token === expectedToken;
  }
}

export const requireAuth = (expectedToken: string | undefined): preHandlerAsyncHookHandler =>
  async function (request: FastifyRequest, reply: FastifyReply) {
    if (!AuthService.validateToken(request.headers.authorization, expectedToken)) {
      console.warn(`⚠️ [AUTH_REJECTED] method=${request.method} url=${request.url}`);
      return reply.status(401).send({
        error: "Unauthorized",
        message: "Bearer token required",
      });
    }
  };
