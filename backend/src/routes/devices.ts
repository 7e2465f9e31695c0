import { Router, Request, Response } from 'express';
import { DeviceRegistry, toDeviceListing } from '../services/DeviceRegistry';
import { DeviceClientFactory, createDeviceClient } from '../services/DeviceClient';
import { ProbeError } from '../services/DeviceErrors';
import { ReverseLookup, resolveDnsName } from '../utils/dns';
import { sanitizeLogData } from '../utils/sanitize';
import { isErrorLike } from '../utils/json';

export function createDeviceRoutes(
  registry: DeviceRegistry,
  createClient: DeviceClientFactory = createDeviceClient,
  reverseLookup?: ReverseLookup,
): Router {
  const router = Router();

  // GET /api/devices — list configured devices, passwords masked
  router.get('/', async (_req: Request, res: Response) => {
    const devices = await Promise.all(registry.getAllDevices().map(async (device) => ({
      ...toDeviceListing(device),
      dns_name: await resolveDnsName(device, reverseLookup),
    })));
    res.json({ devices });
  });

  // POST /api/devices — register a device
  router.post('/', (req: Request, res: Response) => {
    const result = registry.register(req.body);
    if (!result.success) {
      return res.status(result.duplicate ? 409 : 400).json({ error: result.error });
    }
    res.status(201).json(result.device ? toDeviceListing(result.device) : {});
  });

  // GET /api/devices/:ip — live firmware status
  router.get('/:ip', async (req: Request, res: Response) => {
    const device = registry.getDevice(req.params.ip);
    if (!device) {
      return res.status(404).json({ error: 'Device not found' });
    }

    try {
      const firmware = await createClient(device).probe();
      res.json({ ip: device.ip, ...firmware });
    } catch (err) {
      if (err instanceof ProbeError) {
        return res.status(502).json({ error: `Failed to get device status: ${err.message}`, kind: err.kind });
      }
      const message = sanitizeLogData(isErrorLike(err) ? err.message : err);
      console.error(`Devices: ${device.ip}: status probe failed: ${message}`);
      res.status(500).json({ error: 'Failed to get device status' });
    }
  });

  // DELETE /api/devices/:ip — remove a device
  router.delete('/:ip', (req: Request, res: Response) => {
    const removed = registry.removeDevice(req.params.ip);
    if (!removed) {
      return res.status(404).json({ error: 'Device not found' });
    }
    res.json({ success: true });
  });

  return router;
}
