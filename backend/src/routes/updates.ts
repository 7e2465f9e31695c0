import { Router, Request, Response } from 'express';
import { UpdateService } from '../services/UpdateService';
import { DeviceRegistry } from '../services/DeviceRegistry';
import { FleetConfigurationError } from '../services/FleetCoordinator';
import { ReconcileOptions } from '../types/Update';
import { DeviceConfig } from '../types/Device';
import { isRecord } from '../utils/json';
import { parseDeviceInput } from '../utils/deviceInput';
import { isValidTimeout } from '../utils/validation';

type OptionsResult = { ok: true; options: ReconcileOptions } | { ok: false; error: string };

const FLAG_FIELDS = [
  ['check_only', 'checkOnly'],
  ['force_update', 'forceUpdate'],
  ['dry_run', 'dryRun'],
] as const;

export function parseReconcileOptions(body: unknown): OptionsResult {
  const raw = isRecord(body) ? body : {};
  const options: ReconcileOptions = {};

  for (const [field, key] of FLAG_FIELDS) {
    const value = raw[field];
    if (value === undefined || value === null) continue;
    if (typeof value !== 'boolean') {
      return { ok: false, error: `${field} must be a boolean` };
    }
    options[key] = value;
  }

  if (raw.timeout !== undefined && raw.timeout !== null) {
    if (!isValidTimeout(raw.timeout)) {
      return { ok: false, error: 'timeout must be a whole number of seconds between 1 and 3600' };
    }
    options.timeout = raw.timeout;
  }

  return { ok: true, options };
}

export function createUpdateRoutes(updateService: UpdateService, registry: DeviceRegistry): Router {
  const router = Router();

  // POST /api/update — reconcile a single device
  router.post('/', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.ip !== 'string' || body.ip.length === 0) {
      return res.status(400).json({ error: 'Invalid request', details: { ip: 'Missing required field: ip' } });
    }
    const parsedOptions = parseReconcileOptions(body);
    if (!parsedOptions.ok) {
      return res.status(400).json({ error: 'Invalid request', details: parsedOptions.error });
    }

    let device: DeviceConfig | undefined = registry.getDevice(body.ip);
    const { username, password } = body;
    if (device && typeof username === 'string' && typeof password === 'string' && username && password) {
      device = { ...device, credentials: { username, password } };
    }
    if (!device) {
      const parsed = parseDeviceInput({ ip: body.ip, port: body.port, username, password });
      if (!parsed.ok) {
        return res.status(400).json({ error: 'Invalid request', details: parsed.error });
      }
      device = parsed.device;
    }

    try {
      const { runId, outcome } = await updateService.updateDevice(device, parsedOptions.options);
      res.json({ runId, ...outcome });
    } catch (err) {
      console.error(`Updates: ${device.ip}: update failed:`, err);
      res.status(500).json({ error: 'Device update failed' });
    }
  });

  // POST /api/update/all — reconcile every configured device
  router.post('/all', async (req: Request, res: Response) => {
    const parsedOptions = parseReconcileOptions(req.body);
    if (!parsedOptions.ok) {
      return res.status(400).json({ error: 'Invalid request', details: parsedOptions.error });
    }

    try {
      const summary = await updateService.runFleet(parsedOptions.options, 'manual');
      const { outcomes, ...counts } = summary;
      res.json({ runId: summary.runId, results: outcomes, summary: counts });
    } catch (err) {
      if (err instanceof FleetConfigurationError) {
        return res.status(404).json({ error: 'No devices found in configuration' });
      }
      console.error('Updates: fleet run failed:', err);
      res.status(500).json({ error: 'Fleet update failed' });
    }
  });

  // GET /api/update/runs — recent runs, newest first
  router.get('/runs', (req: Request, res: Response) => {
    const limitParam = typeof req.query.limit === 'string' ? parseInt(req.query.limit, 10) : NaN;
    const limit = Number.isInteger(limitParam) && limitParam > 0 ? Math.min(limitParam, 100) : 20;
    res.json({ runs: updateService.getRecentRuns(limit) });
  });

  // GET /api/update/runs/:id — one run with its outcomes in device order
  router.get('/runs/:id', (req: Request, res: Response) => {
    const details = updateService.getRun(req.params.id);
    if (!details) {
      return res.status(404).json({ error: 'Update run not found' });
    }
    res.json(details);
  });

  return router;
}
