import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from 'fastify';

function requestToken(request: FastifyRequest): string | undefined {
  const apiKeyHeader = request.headers['x-api-key'];
  if (apiKeyHeader) {
    return Array.isArray(apiKeyHeader) ? apiKeyHeader[0] : apiKeyHeader;
  }

  const authHeader = request.headers.authorization;
  if (!authHeader) {
    return undefined;
  }
  const parts = authHeader.split(' ');
  if (parts.length !== 2) {
    return undefined;
  }
  const scheme = parts[0].toLowerCase();
  return scheme === 'bearer' || scheme === 'token' ? parts[1] : undefined;
}

export function createAuthHook(apiKeys: string[]) {
  const keySet = new Set(apiKeys);

  return function authHook(
    request: FastifyRequest,
    reply: FastifyReply,
    done: HookHandlerDoneFunction
  ): void {
    const token = requestToken(request);

    if (!token) {
      void reply.code(401).send({ error: 'Missing Authorization header or X-API-Key' });
      return;
    }

    if (!keySet.has(token)) {
      void reply.code(403).send({ error: 'Invalid API key' });
      return;
    }

    done();
  };
}
