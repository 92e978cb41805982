import { Request, Response } from 'express';
import { ArticleStore } from '../store/article-store';
import { SemanticIndex } from '../search/semantic-index';
import { errorMessage } from '../utils/errors';

export function createHealthCheck(store: ArticleStore, index: SemanticIndex) {
  return async function healthCheck(_req: Request, res: Response): Promise<void> {
    try {
      await store.ping();
      const totalArticles = await store.countArticles();

      res.json({
        status: 'healthy',
        database: 'connected',
        totalArticles,
        indexedHighlights: index.size,
        timestamp: new Date().toISOString()
      });
    } catch (error) {
      console.error('❌ Health check failed:', errorMessage(error));
      res.status(503).json({
        status: 'unhealthy',
        database: 'disconnected',
        timestamp: new Date().toISOString()
      });
    }
  };
}
