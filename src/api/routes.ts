import { Request, Router } from 'express';
import { ApiResponse, ApiServices, createApiHandlers } from './handlers';
import { apiKeyAuth, asyncHandler, chatRateLimiter, extractRateLimiter } from './middleware';

function respond<T>(fn: (req: Request) => Promise<ApiResponse<T>>) {
  return asyncHandler(async (req, res) => {
    const { status, body } = await fn(req);
    res.status(status).json(body);
  });
}

/**
 * JSON API mounted under /api
 */
export function createApiRouter(services: ApiServices, options: { apiKey?: string } = {}): Router {
  const router = Router();
  const handlers = createApiHandlers(services);

  router.post('/extract', extractRateLimiter, apiKeyAuth(options.apiKey), respond(req => handlers.extract(req.body)));
  router.get('/highlights', respond(req => handlers.highlights(req.query)));
  router.get('/articles', respond(req => handlers.articles(req.query)));
  router.post('/chat', chatRateLimiter, respond(req => handlers.chat(req.body)));
  router.get('/status', respond(() => handlers.status()));

  return router;
}
