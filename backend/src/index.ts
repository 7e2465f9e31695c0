import express, { ErrorRequestHandler } from 'express';
import { Server } from 'http';
import Database from 'better-sqlite3';
import { createDatabase } from './models/Database';
import { DeviceModel } from './models/Device';
import { UpdateRunModel } from './models/UpdateRun';
import { DeviceRegistry } from './services/DeviceRegistry';
import { ReleaseResolver } from './services/ReleaseResolver';
import { UpdateOrchestrator } from './services/UpdateOrchestrator';
import { FleetCoordinator, ReleaseSource } from './services/FleetCoordinator';
import { UpdateService } from './services/UpdateService';
import { DeviceClientFactory, createDeviceClient } from './services/DeviceClient';
import { WebSocketService } from './services/WebSocketService';
import { Scheduler } from './services/Scheduler';
import { createDeviceRoutes } from './routes/devices';
import { createReleaseRoutes } from './routes/releases';
import { createUpdateRoutes } from './routes/updates';
import { ReverseLookup } from './utils/dns';
import { APP_INFO, FLEET_CONFIG, SCHEDULER_CONFIG, SERVER_CONFIG } from './config';

export interface AppOptions {
  dbPath?: string;
  releases?: ReleaseSource;
  orchestrator?: UpdateOrchestrator;
  createClient?: DeviceClientFactory;
  reverseLookup?: ReverseLookup;
  concurrency?: number;
}

export interface AppContext {
  app: express.Express;
  db: Database.Database;
  registry: DeviceRegistry;
  updateService: UpdateService;
}

export function createApp(options: AppOptions = {}): AppContext {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // Initialize database and models
  const db = createDatabase(options.dbPath ?? SERVER_CONFIG.dbPath);
  const deviceModel = new DeviceModel(db);
  const updateRunModel = new UpdateRunModel(db);

  // Initialize services
  const createClient = options.createClient ?? createDeviceClient;
  const registry = new DeviceRegistry(deviceModel);
  const releases = options.releases ?? new ReleaseResolver();
  const orchestrator = options.orchestrator ?? new UpdateOrchestrator({ reverseLookup: options.reverseLookup });
  const coordinator = new FleetCoordinator(releases, orchestrator, {
    concurrency: options.concurrency ?? FLEET_CONFIG.concurrency,
    createClient,
  });
  const updateService = new UpdateService(registry, coordinator, updateRunModel);

  app.use('/api/devices', createDeviceRoutes(registry, createClient, options.reverseLookup));
  app.use('/api/releases', createReleaseRoutes(releases));
  app.use('/api/update', createUpdateRoutes(updateService, registry));

  app.get('/version', (_req, res) => {
    res.json({ name: APP_INFO.name, version: APP_INFO.version });
  });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const handleErrors: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }
    console.error('Server: unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(handleErrors);

  return { app, db, registry, updateService };
}

export interface RunningServer {
  server: Server;
  close(): void;
}

export function startServer(context: AppContext, port: number = SERVER_CONFIG.port, host: string = SERVER_CONFIG.host): RunningServer {
  const { app, registry, updateService } = context;

  if (SERVER_CONFIG.devicesFile && registry.count() === 0) {
    registry.importFromFile(SERVER_CONFIG.devicesFile);
  }

  const server = app.listen(port, host, () => {
    console.log(`${APP_INFO.name} running on ${host}:${port}`);
  });

  const wsService = new WebSocketService(server);
  updateService.setBroadcaster(wsService);

  let scheduler: Scheduler | null = null;
  if (SCHEDULER_CONFIG.enabled) {
    scheduler = new Scheduler(updateService, registry);
    scheduler.start();
  }

  return {
    server,
    close: () => {
      scheduler?.stop();
      wsService.close();
      server.close();
      context.db.close();
    },
  };
}

if (require.main === module) {
  const context = createApp();
  const running = startServer(context);
  process.on('SIGTERM', () => running.close());
  process.on('SIGINT', () => running.close());
}
