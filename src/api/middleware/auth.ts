import { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { UnauthorizedError } from '../../shared/errors';

const PUBLIC_PATHS = ['/health', '/live', '/ready'];

export function isPublicPath(url: string): boolean {
  const path = url.split('?')[0] ?? url;
  return PUBLIC_PATHS.includes(path);
}

/**
 * onRequest hook checking `x-api-key` or `Authorization: Bearer` against the
 * shared secret. Probes are exempt.
 */
export function createAuthHook(apiSecretKey: string) {
  return async function authMiddleware(
    request: FastifyRequest,
    _reply: FastifyReply
  ): Promise<void> {
    if (isPublicPath(request.url)) {
      return;
    }

    const apiKey = request.headers['x-api-key'];
    const authHeader = request.headers.authorization;

    let token: string | undefined;

    // Check X-API-Key header first
    if (typeof apiKey === 'string' && apiKey.length > 0) {
      token = apiKey;
    }
    // Then check Authorization: Bearer header
    else if (authHeader?.startsWith('Bearer ')) {
      token = authHeader.substring(7);
    }

    if (!token) {
      throw new UnauthorizedError('Missing API key or authorization token');
    }

    if (token !== apiSecretKey) {
      request.log.warn({ providedKey: token.substring(0, 4) + '...' }, 'Invalid API key attempt');
      throw new UnauthorizedError('Invalid API key');
    }

    request.log.debug('API key validated');
  };
}

export interface ApiKeyAuthOptions {
  apiSecretKey: string;
}

const apiKeyAuthPlugin: FastifyPluginAsync<ApiKeyAuthOptions> = async (
  app: FastifyInstance,
  options: ApiKeyAuthOptions
) => {
  app.addHook('onRequest', createAuthHook(options.apiSecretKey));
};

export const apiKeyAuth = fp(apiKeyAuthPlugin, {
  name: 'api-key-auth',
  dependencies: ['correlation-middleware'],
});
