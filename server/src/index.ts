import { ConfigManager } from './config/ConfigManager';
import { ApiServer } from './server/ApiServer';
import { formatSyncError } from './server/errorMessages';
import { resolveCaptureBackends } from './capture';
import { SyncCoordinator } from './sync/SyncCoordinator';
import { TapoLightController } from './tapo/TapoLightController';
import { discoverDevice } from './tapo/discovery';
import { parseModeArgument } from './cli';
import type { CaptureBackends } from './capture/types';
import type { Credentials } from './sync/types';

class TapoSyncApp {
  private configManager: ConfigManager;
  private apiServer: ApiServer | null = null;

  constructor() {
    this.configManager = new ConfigManager();
  }

  async start(argv: readonly string[]): Promise<void> {
    console.log('Starting Tapo Sync...\n');

    try {
      const mode = parseModeArgument(argv);

      // Load configuration
      const config = await this.configManager.load();
      if (!config.credentials) {
        console.warn('⚠ No Tapo account configured. Sign in via POST /api/session or set TAPO_EMAIL / TAPO_PASSWORD.\n');
      }

      // Probe capture tools
      const capture = await resolveCaptureBackends();

      this.apiServer = new ApiServer(
        this.configManager,
        capture,
        credentials => this.createCoordinator(credentials, capture),
        (credentials, options) => discoverDevice(credentials, options)
      );
      await this.apiServer.start(config.port);

      if (mode) {
        try {
          const status = await this.apiServer.startSync({ mode });
          console.log(`✓ ${mode} sync started on ${status.deviceIp}\n`);
        } catch (error) {
          console.warn(`⚠ Could not start ${mode} sync: ${formatSyncError(error)}\n`);
        }
      }
    } catch (error) {
      console.error('Failed to start application:', formatSyncError(error));
      process.exit(1);
    }
  }

  private createCoordinator(credentials: Credentials, capture: CaptureBackends): SyncCoordinator {
    return new SyncCoordinator(credentials, {
      session: new TapoLightController(credentials),
      capture,
      discoverDevice: creds => discoverDevice(creds, this.configManager.getConfig().discovery),
    });
  }

  async stop(): Promise<void> {
    console.log('\nStopping Tapo Sync...');
    if (this.apiServer) {
      await this.apiServer.stop();
    }
    console.log('✓ Stopped\n');
  }
}

// Create and start the application
const app = new TapoSyncApp();

// Handle shutdown gracefully
const shutdown = async () => {
  try {
    await app.stop();
  } catch (error) {
    console.error('Error during shutdown:', formatSyncError(error));
  }
  process.exit(0);
};
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

// Start the app
app.start(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
