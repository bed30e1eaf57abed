import express, { Express, Request, Response } from 'express';
import { WebSocketServer, WebSocket } from 'ws';
import * as http from 'http';
import { isIPv4 } from 'net';
import { ConfigManager } from '../config/ConfigManager';
import { SyncCoordinator, ColorEvent } from '../sync/SyncCoordinator';
import { ConfigurationError, DeviceNotFoundError } from '../sync/errors';
import { formatSyncError, httpStatusFor } from './errorMessages';
import type { CaptureBackends } from '../capture/types';
import type { DiscoveryOptions } from '../tapo/discovery';
import type { Credentials, SyncMode, SyncStatus } from '../sync/types';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const COLOR_BROADCAST_INTERVAL_MS = 100;

export type CoordinatorFactory = (credentials: Credentials) => SyncCoordinator;
export type DeviceDiscovery = (credentials: Credentials, options: DiscoveryOptions) => Promise<string | null>;

export interface SyncRequest {
  mode: SyncMode;
  deviceIp?: string;
  brightness?: number;
  refreshRate?: number;
  audioDevice?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalIp(value: unknown): string | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string' || !isIPv4(value.trim())) {
    throw new ConfigurationError('Device IP must be a valid IPv4 address.');
  }
  return value.trim();
}

function optionalNumber(value: unknown, label: string, min: number, max: number): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
    throw new ConfigurationError(`${label} must be a number between ${min} and ${max}.`);
  }
  return value;
}

/**
 * Validate a sync start request body.
 */
export function parseSyncRequest(body: unknown): SyncRequest {
  const raw = isRecord(body) ? body : {};
  const { mode, audioDevice } = raw;

  if (mode !== 'audio' && mode !== 'screen') {
    throw new ConfigurationError('Mode must be "audio" or "screen".');
  }
  if (audioDevice !== undefined && typeof audioDevice !== 'string') {
    throw new ConfigurationError('Audio device must be a string.');
  }

  return {
    mode,
    deviceIp: optionalIp(raw.deviceIp),
    brightness: optionalNumber(raw.brightness, 'Brightness', 1, 100),
    refreshRate: optionalNumber(raw.refreshRate, 'Refresh rate', 1, 240),
    audioDevice: typeof audioDevice === 'string' && audioDevice.trim() ? audioDevice.trim() : undefined,
  };
}

export function parseCredentials(body: unknown): { credentials: Credentials; deviceIp?: string } {
  const raw = isRecord(body) ? body : {};
  const email = typeof raw.email === 'string' ? raw.email.trim() : '';
  const password = typeof raw.password === 'string' ? raw.password : '';

  if (!EMAIL_PATTERN.test(email)) {
    throw new ConfigurationError('Enter a valid email address.');
  }
  if (password.length === 0) {
    throw new ConfigurationError('Password is required.');
  }

  return { credentials: { email, password }, deviceIp: optionalIp(raw.deviceIp) };
}

export class ApiServer {
  private app: Express;
  private server: http.Server;
  private wss: WebSocketServer;
  private configManager: ConfigManager;
  private capture: CaptureBackends;
  private createCoordinator: CoordinatorFactory;
  private discover: DeviceDiscovery;
  private coordinator: SyncCoordinator | null = null;
  private lastColorBroadcast = 0;

  constructor(
    configManager: ConfigManager,
    capture: CaptureBackends,
    createCoordinator: CoordinatorFactory,
    discover: DeviceDiscovery
  ) {
    this.app = express();
    this.server = http.createServer(this.app);
    this.wss = new WebSocketServer({ server: this.server });
    this.configManager = configManager;
    this.capture = capture;
    this.createCoordinator = createCoordinator;
    this.discover = discover;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupWebSocket();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json());
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    // Config routes
    this.app.get('/api/config', this.getConfig.bind(this));
    this.app.post('/api/config', this.updateConfig.bind(this));

    // Session routes
    this.app.post('/api/session', this.signIn.bind(this));
    this.app.delete('/api/session', this.signOut.bind(this));

    // Device routes
    this.app.get('/api/audio/devices', this.getAudioDevices.bind(this));
    this.app.get('/api/device/discover', this.discoverDevice.bind(this));
    this.app.get('/api/device/info', this.getDeviceInfo.bind(this));

    // Sync routes
    this.app.get('/api/sync/status', this.getSyncStatus.bind(this));
    this.app.post('/api/sync/start', this.startSyncRoute.bind(this));
    this.app.post('/api/sync/stop', this.stopSyncRoute.bind(this));
    this.app.post('/api/sync/brightness', this.setBrightness.bind(this));
  }

  /**
   * Setup WebSocket for real-time updates
   */
  private setupWebSocket(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      console.log('[ApiServer] WebSocket client connected');
      ws.send(JSON.stringify({ type: 'status', data: this.getStatus() }));

      ws.on('close', () => {
        console.log('[ApiServer] WebSocket client disconnected');
      });
    });
  }

  /**
   * Broadcast message to all WebSocket clients
   */
  private broadcast(type: string, data: unknown): void {
    const message = JSON.stringify({ type, data });
    this.wss.clients.forEach(client => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    });
  }

  /**
   * Coordinator for the stored credentials, created on first use
   */
  private getCoordinator(): SyncCoordinator | null {
    if (this.coordinator) {
      return this.coordinator;
    }

    const { credentials } = this.configManager.getConfig();
    if (!credentials) {
      return null;
    }

    const coordinator = this.createCoordinator(credentials);
    coordinator.on('status', (status: SyncStatus) => {
      this.broadcast('status', status);
    });
    coordinator.on('color', (event: ColorEvent) => {
      const now = Date.now();
      if (now - this.lastColorBroadcast >= COLOR_BROADCAST_INTERVAL_MS) {
        this.lastColorBroadcast = now;
        this.broadcast('color', event);
      }
    });
    coordinator.on('failed', (error: unknown) => {
      this.broadcast('error', { message: formatSyncError(error) });
    });

    this.coordinator = coordinator;
    return coordinator;
  }

  private requireCoordinator(): SyncCoordinator {
    const coordinator = this.getCoordinator();
    if (!coordinator) {
      throw new ConfigurationError('Sign in with your Tapo account first.');
    }
    return coordinator;
  }

  private async dropCoordinator(): Promise<void> {
    const coordinator = this.coordinator;
    if (!coordinator) {
      return;
    }
    this.coordinator = null;
    await coordinator.stop();
    coordinator.removeAllListeners();
  }

  getStatus(): SyncStatus {
    if (this.coordinator) {
      return this.coordinator.getStatus();
    }
    return { activeMode: null, deviceIp: null, screenBrightness: null };
  }

  /**
   * Start a sync mode, merging request overrides onto the stored settings.
   * A device address that worked is remembered for the next start.
   */
  async startSync(request: SyncRequest): Promise<SyncStatus> {
    const coordinator = this.requireCoordinator();
    const config = this.configManager.getConfig();

    const audioSettings = {
      ...config.audio,
      deviceSelector: request.audioDevice ?? config.audio.deviceSelector,
    };
    const screenSettings = {
      ...config.screen,
      refreshRate: request.refreshRate ?? config.screen.refreshRate,
    };
    const brightness = request.brightness ?? config.screenBrightness;

    await coordinator.start(
      request.mode,
      request.deviceIp ?? config.deviceIp,
      audioSettings,
      screenSettings,
      brightness
    );

    const status = coordinator.getStatus();
    if (status.deviceIp && status.deviceIp !== config.deviceIp) {
      this.configManager.updateConfig({ deviceIp: status.deviceIp });
      await this.configManager.save();
    }
    return status;
  }

  async stopSync(): Promise<SyncStatus> {
    if (this.coordinator) {
      await this.coordinator.stop();
    }
    return this.getStatus();
  }

  private sendError(res: Response, error: unknown): void {
    res.status(httpStatusFor(error)).json({ error: formatSyncError(error) });
  }

  // API Route Handlers

  private async getConfig(req: Request, res: Response): Promise<void> {
    const { credentials, ...config } = this.configManager.getConfig();
    res.json({
      ...config,
      signedIn: credentials !== undefined,
      email: credentials?.email ?? null,
    });
  }

  private async updateConfig(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        throw new ConfigurationError('Expected a JSON object.');
      }
      if (body.deviceIp !== undefined) {
        optionalIp(body.deviceIp);
      }
      this.configManager.updateConfig(body);
      await this.configManager.save();
      res.json({ success: true });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async signIn(req: Request, res: Response): Promise<void> {
    try {
      const { credentials, deviceIp } = parseCredentials(req.body);

      await this.dropCoordinator();
      this.configManager.setCredentials(credentials, deviceIp ?? this.configManager.getConfig().deviceIp);
      await this.configManager.save();
      console.log(`[ApiServer] Signed in as ${credentials.email}`);

      this.broadcast('status', this.getStatus());
      res.json({ success: true, email: credentials.email });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async signOut(req: Request, res: Response): Promise<void> {
    try {
      await this.dropCoordinator();
      this.configManager.clearCredentials();
      await this.configManager.save();
      console.log('[ApiServer] Signed out');

      this.broadcast('status', this.getStatus());
      res.json({ success: true });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async getAudioDevices(req: Request, res: Response): Promise<void> {
    try {
      const backend = this.capture.audio;
      const devices = backend ? await backend.listDevices() : [];
      res.json({ backend: backend?.name ?? null, devices });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async discoverDevice(req: Request, res: Response): Promise<void> {
    try {
      const { credentials, discovery } = this.configManager.getConfig();
      if (!credentials) {
        throw new ConfigurationError('Sign in with your Tapo account first.');
      }

      const deviceIp = await this.discover(credentials, discovery);
      if (!deviceIp) {
        throw new DeviceNotFoundError();
      }

      this.configManager.updateConfig({ deviceIp });
      await this.configManager.save();
      res.json({ deviceIp });
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async getDeviceInfo(req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.requireCoordinator().getDeviceInfo());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async getSyncStatus(req: Request, res: Response): Promise<void> {
    res.json(this.getStatus());
  }

  private async startSyncRoute(req: Request, res: Response): Promise<void> {
    try {
      const status = await this.startSync(parseSyncRequest(req.body));
      res.json(status);
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async stopSyncRoute(req: Request, res: Response): Promise<void> {
    try {
      res.json(await this.stopSync());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async setBrightness(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;
      const brightness = optionalNumber(isRecord(body) ? body.brightness : undefined, 'Brightness', 1, 100);
      if (brightness === undefined) {
        throw new ConfigurationError('Brightness is required.');
      }

      this.coordinator?.setScreenBrightness(brightness);
      this.configManager.updateConfig({ screenBrightness: brightness });
      await this.configManager.save();
      res.json(this.getStatus());
    } catch (error) {
      this.sendError(res, error);
    }
  }

  /**
   * Start the server; resolves with the bound port
   */
  start(port: number = 3000): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        const bound = this.getPort();
        console.log(`\n Tapo Sync Server`);
        console.log(`API:       http://localhost:${bound}/api`);
        console.log(`WebSocket: ws://localhost:${bound}\n`);
        resolve(bound);
      });
    });
  }

  getPort(): number {
    const address = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : 0;
  }

  /**
   * Stop any running sync, then the server
   */
  async stop(): Promise<void> {
    await this.dropCoordinator();
    this.wss.clients.forEach(client => client.terminate());
    await new Promise<void>(resolve => this.wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
