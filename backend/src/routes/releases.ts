import { Router, Request, Response } from 'express';
import { ReleaseSource } from '../services/FleetCoordinator';

export function createReleaseRoutes(releases: ReleaseSource): Router {
  const router = Router();

  // GET /api/releases/latest — latest upstream release (?refresh=true skips the cache)
  router.get('/latest', async (req: Request, res: Response) => {
    const refresh = req.query.refresh === 'true';
    const result = await releases.getLatestRelease({ refresh });
    if (!result.ok) {
      return res.status(502).json({ error: `Failed to fetch latest release information: ${result.error}` });
    }
    res.json(result.release);
  });

  return router;
}
