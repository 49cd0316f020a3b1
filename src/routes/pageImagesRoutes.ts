import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { PageImagesQuery, parseQueryParams } from '../api/queryPageImages';
import { expandSearchResults, SearchResult } from '../api/searchExpansion';
import { PageImageService } from '../pageImages/pageImageService';
import { handleError, toErrorResponse } from '../utils/errorHandler';

export interface PageImagesRouterDeps {
  query: PageImagesQuery;
  service: PageImageService;
  expandOpenSearch: boolean;
}

const placementSchema = z.object({
  imageId: z.string().min(1),
  width: z.number().positive().optional(),
  height: z.number().positive().optional(),
  layout: z.array(z.enum(['thumbnail', 'framed', 'frameless'])).default([]),
  fullWidth: z.number().int().nonnegative(),
  fullHeight: z.number().int().nonnegative(),
});

export const renderBodySchema = z.object({
  namespace: z.number().int(),
  title: z.string().optional(),
  placements: z.array(placementSchema).max(5000),
});

const searchBodySchema = z.object({
  results: z.array(z.object({
    pageId: z.number().int(),
    title: z.string(),
  })).max(100),
});

function sendError(res: Response, error: unknown, context: string): void {
  handleError(error, context);
  const { status, body } = toErrorResponse(error);
  res.status(status).json(body);
}

export function createPageImagesRouter(deps: PageImagesRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/query/pageimages?pageids=1|2&prop=thumbnail|name&thumbsize=50&limit=1&continue=2
   */
  router.get('/api/query/pageimages', async (req: Request, res: Response) => {
    try {
      const params = parseQueryParams(req.query);
      const result = await deps.query.execute(params);
      res.json({ query: { pages: result.pages }, ...(result.continue !== undefined ? { continue: { continue: result.continue } } : {}) });
    } catch (error) {
      sendError(res, error, 'pageimages query');
    }
  });

  /**
   * POST /api/pages/:pageId/render
   * Accepts the image placements of a freshly rendered page and stores its page image.
   */
  router.post('/api/pages/:pageId/render', async (req: Request, res: Response) => {
    const pageId = Number(req.params.pageId);
    if (!Number.isInteger(pageId) || pageId <= 0) {
      return res.status(400).json({ error: { code: 'badparams', info: 'Invalid page id' } });
    }

    const body = renderBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: { code: 'badparams', info: body.error.issues[0]?.message ?? 'Invalid body' } });
    }

    try {
      const { namespace, title, placements } = body.data;
      const chosen = await deps.service.processRender({ id: pageId, namespace, title }, placements);
      res.json({ pageId, pageImage: chosen });
    } catch (error) {
      sendError(res, error, `render page ${pageId}`);
    }
  });

  /**
   * POST /api/search/expand
   * Adds page image thumbnails to search suggestions.
   */
  router.post('/api/search/expand', async (req: Request, res: Response) => {
    const body = searchBodySchema.safeParse(req.body);
    if (!body.success) {
      return res.status(400).json({ error: { code: 'badparams', info: body.error.issues[0]?.message ?? 'Invalid body' } });
    }

    try {
      const results = new Map<number, SearchResult>(
        body.data.results.map(result => [result.pageId, { title: result.title }])
      );
      const expanded = await expandSearchResults(results, deps.query, deps.expandOpenSearch);
      res.json({
        results: Array.from(expanded, ([pageId, result]) => ({ pageId, ...result })),
      });
    } catch (error) {
      sendError(res, error, 'search expansion');
    }
  });

  return router;
}
